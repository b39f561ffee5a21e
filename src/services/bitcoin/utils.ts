/**
 * Bitcoin Utilities
 */

import * as bitcoin from 'bitcoinjs-lib';
import * as ecc from 'tiny-secp256k1';
import type { NetworkType } from '../../config/types';

// Required by bitcoinjs-lib v6+ for bech32m (taproot) recipients
bitcoin.initEccLib(ecc);

/**
 * Get Bitcoin network object. Signet shares testnet's parameters.
 */
export function getNetwork(network: NetworkType = 'mainnet'): bitcoin.Network {
  switch (network) {
    case 'testnet':
    case 'signet':
      return bitcoin.networks.testnet;
    case 'regtest':
      return bitcoin.networks.regtest;
    default:
      return bitcoin.networks.bitcoin;
  }
}

/**
 * Validate a Bitcoin address for the given network
 */
export function validateAddress(address: string, network: NetworkType = 'mainnet'): { valid: boolean; error?: string } {
  try {
    bitcoin.address.toOutputScript(address, getNetwork(network));
    return { valid: true };
  } catch (error) {
    return {
      valid: false,
      error: error instanceof Error ? error.message : 'Invalid Bitcoin address',
    };
  }
}

/**
 * Reverse a little-endian transaction hash into its txid hex form
 */
export function hashToTxid(hash: Buffer): string {
  return Buffer.from(hash).reverse().toString('hex');
}
