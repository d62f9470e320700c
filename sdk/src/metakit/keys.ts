/**
 * Keys and addresses
 *
 * secp256k1 keys come from the dag4 keystore; an account is the DAG address of
 * its uncompressed public key.
 */

import { dag4 } from '@stardust-collective/dag4';
import type { KeyPair } from './types.js';

const HEX = /^[0-9a-fA-F]+$/;

export function generateKeyPair(): KeyPair {
  return keyPairFromPrivateKey(dag4.keyStore.generatePrivateKey());
}

/**
 * @example
 * ```typescript
 * const { address } = keyPairFromPrivateKey(process.env.VOTER_KEY);
 * ```
 */
export function keyPairFromPrivateKey(privateKey: string): KeyPair {
  const publicKey = withKeyPrefix(dag4.keyStore.getPublicKeyFromPrivate(privateKey, false));
  return { privateKey, publicKey, address: dag4.keyStore.getDagAddressFromPublicKey(publicKey) };
}

/** DAG address for a public key given with or without its 04 prefix */
export function getAddress(publicKey: string): string {
  return dag4.keyStore.getDagAddressFromPublicKey(withKeyPrefix(publicKey));
}

export function isValidPrivateKey(privateKey: string): boolean {
  return privateKey.length === 64 && HEX.test(privateKey);
}

/** 128 hex characters bare, 130 with the 04 prefix */
export function isValidPublicKey(publicKey: string): boolean {
  return (publicKey.length === 128 || publicKey.length === 130) && HEX.test(publicKey);
}

export function withKeyPrefix(publicKey: string): string {
  return publicKey.length === 128 ? `04${publicKey}` : publicKey;
}

export function withoutKeyPrefix(publicKey: string): string {
  return publicKey.length === 130 && publicKey.startsWith('04') ? publicKey.substring(2) : publicKey;
}
