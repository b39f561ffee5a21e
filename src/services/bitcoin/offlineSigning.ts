/**
 * Offline Signing
 *
 * Signs a PSBT with coin data exported from the wallet store, so the signer
 * never needs store access. Completeness is checked separately by verifying
 * every input's signatures against the previous outputs carried in the PSBT.
 *
 * Supported previous outputs: P2WPKH, P2WSH (including m-of-n multisig),
 * P2SH-wrapped segwit, P2PKH and bare P2SH multisig. Legacy inputs carry
 * their previous output as `witnessUtxo`, since the coin data holds no full
 * previous transaction, and are signed over the legacy sighash directly.
 * Partially signed multisig inputs are a normal result.
 */

import * as bitcoin from 'bitcoinjs-lib';
import * as ecc from 'tiny-secp256k1';
import { BIP32Factory, type BIP32Interface } from 'bip32';
import { ErrorCodes, ValidationError, WalletError } from '../../errors';
import { createLogger } from '../../utils/logger';
import { hashToTxid } from './utils';
import type { Account, CoinSignData } from '../../repositories/types';

const log = createLogger('OFFLINE-SIGN');

const bip32 = BIP32Factory(ecc);

type PsbtInput = bitcoin.Psbt['data']['inputs'][number];
type PsbtInputUpdate = Parameters<bitcoin.Psbt['updateInput']>[1];

const OP_CHECKMULTISIG = bitcoin.opcodes.OP_CHECKMULTISIG;
const OP_1 = bitcoin.opcodes.OP_1;
const OP_16 = bitcoin.opcodes.OP_16;

export interface OfflineSignResult {
  /** PSBT carrying every signature gathered so far (base64) */
  psbt: string;
  complete: boolean;
  /** Final raw transaction (hex) when complete */
  tx?: string;
}

/**
 * Parse PSBT from base64 string
 */
export function parsePsbt(psbtBase64: string, network: bitcoin.Network): bitcoin.Psbt {
  try {
    return bitcoin.Psbt.fromBase64(psbtBase64, { network });
  } catch (error) {
    throw new ValidationError(
      `Invalid PSBT format: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCodes.INVALID_PSBT
    );
  }
}

function parsePrivateKey(key: string, network: bitcoin.Network): BIP32Interface {
  let node: BIP32Interface;
  try {
    node = bip32.fromBase58(key, network);
  } catch (error) {
    throw new ValidationError(
      `Invalid extended private key: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCodes.INVALID_INPUT
    );
  }
  if (node.isNeutered()) {
    throw new ValidationError('Expected an extended private key, got a public key', ErrorCodes.INVALID_INPUT);
  }
  return node;
}

/**
 * Account-level signing key: the supplied master key derived along the
 * account path, or the private key the account stores.
 */
export function resolveSigningKey(
  account: Account,
  masterKey: string | undefined,
  network: bitcoin.Network
): BIP32Interface {
  if (masterKey) {
    const root = parsePrivateKey(masterKey, network);
    return account.derivation ? root.derivePath(account.derivation) : root;
  }
  if (account.master) {
    return parsePrivateKey(account.master, network);
  }
  throw new WalletError(`Account ${account.name} holds no private key; a master key is required to sign`, {
    account: account.name,
  });
}

function findInputIndex(psbt: bitcoin.Psbt, coin: CoinSignData): number {
  return psbt.txInputs.findIndex((input) => input.index === coin.vout && hashToTxid(input.hash) === coin.txid);
}

type PrevoutKind = 'segwit' | 'legacy';

function isP2wpkh(script: Buffer): boolean {
  return script.length === 22 && script[0] === 0x00 && script[1] === 0x14;
}

function isP2wsh(script: Buffer): boolean {
  return script.length === 34 && script[0] === 0x00 && script[1] === 0x20;
}

function isP2sh(script: Buffer): boolean {
  return script.length === 23 && script[0] === 0xa9 && script[1] === 0x14 && script[22] === 0x87;
}

function isP2pkh(script: Buffer): boolean {
  return (
    script.length === 25 &&
    script[0] === bitcoin.opcodes.OP_DUP &&
    script[1] === bitcoin.opcodes.OP_HASH160 &&
    script[2] === 0x14 &&
    script[23] === bitcoin.opcodes.OP_EQUALVERIFY &&
    script[24] === bitcoin.opcodes.OP_CHECKSIG
  );
}

function classifyPrevout(script: Buffer, coin: CoinSignData): PrevoutKind | undefined {
  if (isP2wpkh(script) || isP2wsh(script)) return 'segwit';
  if (isP2pkh(script)) return 'legacy';
  if (isP2sh(script) && coin.redeemScript !== undefined) {
    const redeem = Buffer.from(coin.redeemScript, 'hex');
    return isP2wpkh(redeem) || isP2wsh(redeem) ? 'segwit' : 'legacy';
  }
  return undefined;
}

function attachPrevout(psbt: bitcoin.Psbt, index: number, coin: CoinSignData): PrevoutKind {
  const input = psbt.data.inputs[index];
  const script = Buffer.from(coin.script, 'hex');

  const kind = classifyPrevout(script, coin);
  if (!kind) {
    throw new WalletError(`Coin ${coin.txid}:${coin.vout} uses an output script that cannot be signed offline`, {
      txid: coin.txid,
      vout: coin.vout,
    });
  }

  const update: PsbtInputUpdate = {};
  if (!input.witnessUtxo && !input.nonWitnessUtxo) {
    update.witnessUtxo = { script, value: coin.value };
  }
  if (coin.witnessScript && !input.witnessScript) {
    update.witnessScript = Buffer.from(coin.witnessScript, 'hex');
  }
  if (coin.redeemScript && !input.redeemScript) {
    update.redeemScript = Buffer.from(coin.redeemScript, 'hex');
  }
  if (Object.keys(update).length > 0) {
    psbt.updateInput(index, update);
  }
  return kind;
}

/**
 * SIGHASH_ALL signature over the legacy sighash of one input. The script code
 * is the redeem script for P2SH and the output script otherwise.
 */
function signLegacyInput(psbt: bitcoin.Psbt, index: number, coin: CoinSignData, key: BIP32Interface): void {
  const unsignedTx = bitcoin.Transaction.fromBuffer(psbt.data.globalMap.unsignedTx.toBuffer());
  const scriptCode = Buffer.from(coin.redeemScript ?? coin.script, 'hex');
  const hash = unsignedTx.hashForSignature(index, scriptCode, bitcoin.Transaction.SIGHASH_ALL);
  const signature = bitcoin.script.signature.encode(key.sign(hash), bitcoin.Transaction.SIGHASH_ALL);
  psbt.updateInput(index, { partialSig: [{ pubkey: key.publicKey, signature }] });
}

function hasSignatureFrom(input: PsbtInput, pubkey: Buffer): boolean {
  return (input.partialSig ?? []).some((sig) => sig.pubkey.equals(pubkey));
}

/**
 * Signatures an input needs: m for an m-of-n multisig script, otherwise one
 */
export function requiredSignatures(input: PsbtInput): number {
  const script = input.witnessScript ?? input.redeemScript;
  if (!script) return 1;

  const chunks = bitcoin.script.decompile(script);
  if (!chunks || chunks.length < 4) return 1;

  const first = chunks[0];
  const last = chunks[chunks.length - 1];
  if (last !== OP_CHECKMULTISIG || typeof first !== 'number' || first < OP_1 || first > OP_16) {
    return 1;
  }
  return first - OP_1 + 1;
}

const validateSignature = (pubkey: Buffer, msghash: Buffer, signature: Buffer): boolean =>
  ecc.verify(msghash, pubkey, signature);

/**
 * True when every input is final, or has a previous output and enough valid
 * signatures for its script. Signatures from keys outside the input script do
 * not count.
 */
export function isFullySigned(psbt: bitcoin.Psbt): boolean {
  return psbt.data.inputs.every((input, index) => {
    if (input.finalScriptWitness || input.finalScriptSig) return true;
    if (!input.witnessUtxo && !input.nonWitnessUtxo) return false;

    const signatures = (input.partialSig ?? []).filter((sig) => psbt.inputHasPubkey(index, sig.pubkey));
    if (signatures.length < requiredSignatures(input)) return false;

    return signatures.every((sig) => {
      try {
        return psbt.validateSignaturesOfInput(index, validateSignature, sig.pubkey);
      } catch (error) {
        throw new WalletError(
          `Input ${index} carries an unverifiable signature: ${error instanceof Error ? error.message : String(error)}`,
          { index }
        );
      }
    });
  });
}

function extractFinalTx(psbt: bitcoin.Psbt): string {
  try {
    return psbt.clone().finalizeAllInputs().extractTransaction().toHex();
  } catch (error) {
    throw new WalletError(
      `Signed transaction could not be finalized: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Sign every input the account key can sign, then report completeness
 */
export function signOfflineTx(
  account: Account,
  masterKey: string | undefined,
  psbtBase64: string,
  coins: CoinSignData[],
  network: bitcoin.Network
): OfflineSignResult {
  const psbt = parsePsbt(psbtBase64, network);
  const accountKey = resolveSigningKey(account, masterKey, network);

  let signed = 0;
  for (const coin of coins) {
    const index = findInputIndex(psbt, coin);
    if (index < 0) {
      throw new WalletError(`Signing data ${coin.txid}:${coin.vout} does not match any input of the transaction`, {
        txid: coin.txid,
        vout: coin.vout,
      });
    }

    const kind = attachPrevout(psbt, index, coin);

    const key = accountKey.derivePath(coin.derivation);
    if (!psbt.inputHasPubkey(index, key.publicKey)) {
      log.debug('Key not part of input script, skipping', { index, derivation: coin.derivation });
      continue;
    }
    if (hasSignatureFrom(psbt.data.inputs[index], key.publicKey)) {
      continue;
    }

    if (kind === 'segwit') {
      psbt.signInput(index, key);
    } else {
      signLegacyInput(psbt, index, coin, key);
    }
    signed++;
  }

  const complete = isFullySigned(psbt);
  log.debug('Offline signing finished', { inputs: psbt.inputCount, signed, complete });

  return {
    psbt: psbt.toBase64(),
    complete,
    tx: complete ? extractFinalTx(psbt) : undefined,
  };
}
