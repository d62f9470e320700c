/**
 * Metakit
 *
 * Signing, canonical encoding and key handling, independent of the governance domain.
 *
 * @packageDocumentation
 */

export type { SignatureProof, Signed, KeyPair, VerificationResult } from './types.js';

export { canonicalize } from './canonicalize.js';
export { digest, sign, verify, createSignedObject, addSignature } from './signing.js';
export {
  generateKeyPair,
  keyPairFromPrivateKey,
  getAddress,
  isValidPrivateKey,
  isValidPublicKey,
} from './keys.js';
