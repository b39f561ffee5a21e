import { describe, it, expect, vi } from 'vitest';
import * as bitcoin from 'bitcoinjs-lib';
import * as ecc from 'tiny-secp256k1';
import { BIP32Factory } from 'bip32';

vi.mock('../../../../src/utils/logger', () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import {
  isFullySigned,
  parsePsbt,
  requiredSignatures,
  resolveSigningKey,
  signOfflineTx,
} from '../../../../src/services/bitcoin/offlineSigning';
import { ErrorCodes, ValidationError, WalletError } from '../../../../src/errors';
import type { CoinSignData } from '../../../../src/repositories/types';
import { hexId, sampleAccount } from '../../../fixtures/wallet';

const bip32 = BIP32Factory(ecc);
const network = bitcoin.networks.regtest;
const ACCOUNT_PATH = "m/84'/1'/0'";

function wallet(seedByte: number) {
  const root = bip32.fromSeed(Buffer.alloc(32, seedByte), network);
  const account = root.derivePath(ACCOUNT_PATH);
  return { root, account, key: account.derivePath('0/0') };
}

function accountFor(seedByte: number) {
  const { account } = wallet(seedByte);
  return sampleAccount({ master: account.toBase58(), keys: [account.neutered().toBase58()] });
}

const recipient = bitcoin.payments.p2wpkh({ hash: Buffer.alloc(20, 7), network }).address ?? '';

function unsignedPsbt(inputs: Array<{ txid: string; vout: number }>, outputValue: number): string {
  const psbt = new bitcoin.Psbt({ network });
  for (const input of inputs) {
    psbt.addInput({ hash: input.txid, index: input.vout });
  }
  psbt.addOutput({ address: recipient, value: outputValue });
  return psbt.toBase64();
}

function p2wpkhCoin(seedByte: number, txid: string, vout = 0): CoinSignData {
  const { key } = wallet(seedByte);
  const output = bitcoin.payments.p2wpkh({ pubkey: key.publicKey, network }).output;
  return {
    txid,
    vout,
    script: output ? output.toString('hex') : '',
    value: 10000,
    derivation: '0/0',
  };
}

function multisigCoin(txid: string): CoinSignData {
  const pubkeys = [1, 2, 3].map((seed) => wallet(seed).key.publicKey);
  const p2ms = bitcoin.payments.p2ms({ m: 2, pubkeys, network });
  const p2wsh = bitcoin.payments.p2wsh({ redeem: p2ms, network });
  return {
    txid,
    vout: 1,
    script: p2wsh.output ? p2wsh.output.toString('hex') : '',
    value: 20000,
    derivation: '0/0',
    witnessScript: p2ms.output ? p2ms.output.toString('hex') : undefined,
  };
}

function p2pkhCoin(seedByte: number, txid: string): CoinSignData {
  const output = bitcoin.payments.p2pkh({ pubkey: wallet(seedByte).key.publicKey, network }).output;
  return {
    txid,
    vout: 0,
    script: output ? output.toString('hex') : '',
    value: 10000,
    derivation: '0/0',
  };
}

function legacyMultisigCoin(txid: string): CoinSignData {
  const pubkeys = [1, 2, 3].map((seed) => wallet(seed).key.publicKey);
  const p2ms = bitcoin.payments.p2ms({ m: 2, pubkeys, network });
  const p2sh = bitcoin.payments.p2sh({ redeem: p2ms, network });
  return {
    txid,
    vout: 0,
    script: p2sh.output ? p2sh.output.toString('hex') : '',
    value: 20000,
    derivation: '0/0',
    redeemScript: p2ms.output ? p2ms.output.toString('hex') : undefined,
  };
}

const prevTxid = hexId(1, 'ab');

describe('signOfflineTx', () => {
  describe('single key', () => {
    it('signs a P2WPKH input and returns the final transaction', () => {
      const coin = p2wpkhCoin(1, prevTxid);

      const result = signOfflineTx(accountFor(1), undefined, unsignedPsbt([coin], 9000), [coin], network);

      expect(result.complete).toBe(true);
      expect(result.tx).toBeDefined();
      const tx = bitcoin.Transaction.fromHex(result.tx ?? '');
      expect(tx.ins).toHaveLength(1);
      expect(tx.ins[0].witness).toHaveLength(2);
      expect(tx.outs[0].value).toBe(9000);
    });

    it('derives the account key from a supplied master key', () => {
      const coin = p2wpkhCoin(1, prevTxid);
      const account = sampleAccount({ derivation: ACCOUNT_PATH, keys: ['tpub-placeholder'] });

      const result = signOfflineTx(account, wallet(1).root.toBase58(), unsignedPsbt([coin], 9000), [coin], network);

      expect(result.complete).toBe(true);
    });

    it('leaves inputs of other keys unsigned', () => {
      const coin = p2wpkhCoin(9, prevTxid);

      const result = signOfflineTx(accountFor(1), undefined, unsignedPsbt([coin], 9000), [coin], network);

      expect(result.complete).toBe(false);
      expect(result.tx).toBeUndefined();
      expect(parsePsbt(result.psbt, network).data.inputs[0].partialSig).toBeUndefined();
    });

    it('is incomplete while any input is unsigned', () => {
      const mine = p2wpkhCoin(1, prevTxid);
      const theirs = p2wpkhCoin(9, hexId(2, 'ab'));

      const result = signOfflineTx(
        accountFor(1),
        undefined,
        unsignedPsbt([mine, theirs], 15000),
        [mine, theirs],
        network
      );

      expect(result.complete).toBe(false);
      const inputs = parsePsbt(result.psbt, network).data.inputs;
      expect(inputs[0].partialSig).toHaveLength(1);
      expect(inputs[1].partialSig).toBeUndefined();
    });
  });

  describe('2-of-3 multisig', () => {
    it('is incomplete after one signature', () => {
      const coin = multisigCoin(prevTxid);

      const result = signOfflineTx(accountFor(1), undefined, unsignedPsbt([coin], 19000), [coin], network);

      expect(result.complete).toBe(false);
      expect(result.tx).toBeUndefined();
      const input = parsePsbt(result.psbt, network).data.inputs[0];
      expect(input.partialSig).toHaveLength(1);
      expect(requiredSignatures(input)).toBe(2);
    });

    it('completes when a second co-signer signs', () => {
      const coin = multisigCoin(prevTxid);
      const first = signOfflineTx(accountFor(1), undefined, unsignedPsbt([coin], 19000), [coin], network);

      const second = signOfflineTx(accountFor(2), undefined, first.psbt, [coin], network);

      expect(second.complete).toBe(true);
      const tx = bitcoin.Transaction.fromHex(second.tx ?? '');
      // OP_0 placeholder, two signatures, witness script
      expect(tx.ins[0].witness).toHaveLength(4);
    });

    it('does not add a second signature from the same key', () => {
      const coin = multisigCoin(prevTxid);
      const first = signOfflineTx(accountFor(1), undefined, unsignedPsbt([coin], 19000), [coin], network);

      const again = signOfflineTx(accountFor(1), undefined, first.psbt, [coin], network);

      expect(again.complete).toBe(false);
      expect(parsePsbt(again.psbt, network).data.inputs[0].partialSig).toHaveLength(1);
    });
  });

  describe('legacy scripts', () => {
    it('signs a P2PKH input and returns the final transaction', () => {
      const coin = p2pkhCoin(1, prevTxid);

      const result = signOfflineTx(accountFor(1), undefined, unsignedPsbt([coin], 9000), [coin], network);

      expect(result.complete).toBe(true);
      const tx = bitcoin.Transaction.fromHex(result.tx ?? '');
      expect(tx.ins[0].witness).toHaveLength(0);
      const chunks = bitcoin.script.decompile(tx.ins[0].script) ?? [];
      // signature, public key
      expect(chunks).toHaveLength(2);
      expect(chunks[1]).toEqual(wallet(1).key.publicKey);
    });

    it('is incomplete after one signature on a bare P2SH 2-of-3', () => {
      const coin = legacyMultisigCoin(prevTxid);

      const result = signOfflineTx(accountFor(1), undefined, unsignedPsbt([coin], 19000), [coin], network);

      expect(result.complete).toBe(false);
      expect(result.tx).toBeUndefined();
      const input = parsePsbt(result.psbt, network).data.inputs[0];
      expect(input.partialSig).toHaveLength(1);
      expect(requiredSignatures(input)).toBe(2);
    });

    it('completes a bare P2SH 2-of-3 when a second co-signer signs', () => {
      const coin = legacyMultisigCoin(prevTxid);
      const first = signOfflineTx(accountFor(1), undefined, unsignedPsbt([coin], 19000), [coin], network);

      const second = signOfflineTx(accountFor(3), undefined, first.psbt, [coin], network);

      expect(second.complete).toBe(true);
      const tx = bitcoin.Transaction.fromHex(second.tx ?? '');
      expect(tx.ins[0].witness).toHaveLength(0);
      // OP_0 placeholder, two signatures, redeem script
      expect(bitcoin.script.decompile(tx.ins[0].script)).toHaveLength(4);
    });
  });

  describe('foreign signatures', () => {
    it('reports an input signed only by a key outside its script as incomplete', () => {
      const signedElsewhere = signOfflineTx(
        accountFor(1),
        undefined,
        unsignedPsbt([p2wpkhCoin(1, prevTxid)], 9000),
        [p2wpkhCoin(1, prevTxid)],
        network
      );
      const foreignSig = parsePsbt(signedElsewhere.psbt, network).data.inputs[0].partialSig ?? [];
      const coin = p2wpkhCoin(9, prevTxid);
      const psbt = parsePsbt(unsignedPsbt([coin], 9000), network);
      psbt.updateInput(0, { partialSig: foreignSig });

      const result = signOfflineTx(accountFor(1), undefined, psbt.toBase64(), [coin], network);

      expect(result.complete).toBe(false);
      expect(result.tx).toBeUndefined();
    });
  });

  describe('errors', () => {
    it('rejects signing data for an outpoint the transaction does not spend', () => {
      const coin = p2wpkhCoin(1, prevTxid);
      const stray = p2wpkhCoin(1, hexId(3, 'ab'));

      expect(() => signOfflineTx(accountFor(1), undefined, unsignedPsbt([coin], 9000), [stray], network)).toThrow(
        WalletError
      );
    });

    it('rejects previous outputs with an unsupported script', () => {
      const embed = bitcoin.payments.embed({ data: [Buffer.from('memo')] }).output;
      const coin: CoinSignData = {
        ...p2wpkhCoin(1, prevTxid),
        script: embed ? embed.toString('hex') : '',
      };

      expect(() => signOfflineTx(accountFor(1), undefined, unsignedPsbt([coin], 9000), [coin], network)).toThrow(
        `Coin ${prevTxid}:0 uses an output script that cannot be signed offline`
      );
    });

    it('rejects a malformed PSBT', () => {
      try {
        signOfflineTx(accountFor(1), undefined, 'not-a-psbt', [], network);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        expect(error).toMatchObject({ code: ErrorCodes.INVALID_PSBT });
      }
    });
  });
});

describe('resolveSigningKey', () => {
  it('fails when the account has no private key and none is supplied', () => {
    const account = sampleAccount({ keys: ['tpub-placeholder'] });

    expect(() => resolveSigningKey(account, undefined, network)).toThrow(
      'Account savings holds no private key; a master key is required to sign'
    );
  });

  it('rejects an extended public key in place of a master key', () => {
    const account = sampleAccount();

    expect(() => resolveSigningKey(account, wallet(1).root.neutered().toBase58(), network)).toThrow(
      'Expected an extended private key, got a public key'
    );
  });

  it('rejects a key that does not parse', () => {
    expect(() => resolveSigningKey(sampleAccount(), 'tprv-garbage', network)).toThrow(ValidationError);
  });
});

describe('isFullySigned', () => {
  it('is false for an input without previous output data', () => {
    const psbt = parsePsbt(unsignedPsbt([{ txid: prevTxid, vout: 0 }], 9000), network);

    expect(isFullySigned(psbt)).toBe(false);
  });
});
