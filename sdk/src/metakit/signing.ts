/**
 * Signed objects
 *
 * A value is signed by canonicalizing it (RFC 8785), taking the SHA-256 hex
 * digest of the canonical string and handing that digest to the dag4 keystore.
 * Any service that re-serializes the value arrives at the same digest, so
 * claims survive a trip through JSON bodies untouched.
 */

import { dag4 } from '@stardust-collective/dag4';
import { sha256 } from 'js-sha256';
import { canonicalize } from './canonicalize.js';
import { withKeyPrefix, withoutKeyPrefix } from './keys.js';
import type { Signed, SignatureProof, VerificationResult } from './types.js';

/** The hex digest that gets signed for `value` */
export function digest<T>(value: T): string {
  return sha256(canonicalize(value));
}

export async function sign<T>(value: T, privateKey: string): Promise<SignatureProof> {
  const signature = await dag4.keyStore.sign(privateKey, digest(value));
  const publicKey = dag4.keyStore.getPublicKeyFromPrivate(privateKey, false);
  return { id: withoutKeyPrefix(publicKey), signature };
}

/**
 * @example
 * ```typescript
 * const signed = await createSignedObject({ account, operation: 'elevate', issuedAt }, ownerKey);
 * ```
 */
export async function createSignedObject<T>(value: T, privateKey: string): Promise<Signed<T>> {
  return { value, proofs: [await sign(value, privateKey)] };
}

/** Co-sign an already signed value; existing proofs are kept */
export async function addSignature<T>(signed: Signed<T>, privateKey: string): Promise<Signed<T>> {
  return { value: signed.value, proofs: [...signed.proofs, await sign(signed.value, privateKey)] };
}

/**
 * Check every proof on `signed` against the digest of its value. An object with
 * no proofs is not valid.
 */
export async function verify<T>(signed: Signed<T>): Promise<VerificationResult> {
  const hashHex = digest(signed.value);
  const validProofs: SignatureProof[] = [];
  const invalidProofs: SignatureProof[] = [];

  for (const proof of signed.proofs) {
    if (verifyProof(hashHex, proof)) {
      validProofs.push(proof);
    } else {
      invalidProofs.push(proof);
    }
  }

  return { isValid: validProofs.length > 0 && invalidProofs.length === 0, validProofs, invalidProofs };
}

// The keystore throws on malformed keys or signatures; those proofs are invalid
function verifyProof(hashHex: string, proof: SignatureProof): boolean {
  try {
    return dag4.keyStore.verify(withKeyPrefix(proof.id), hashHex, proof.signature);
  } catch {
    return false;
  }
}
