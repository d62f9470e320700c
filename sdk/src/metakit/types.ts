/**
 * Signing primitives shared by wallets and services
 */

/** One signer's signature over a value */
export interface SignatureProof {
  /** Uncompressed secp256k1 public key, hex, without the 04 prefix */
  id: string;
  /** DER-encoded ECDSA signature, hex */
  signature: string;
}

/** A value together with the proofs of everyone who signed it */
export interface Signed<T> {
  value: T;
  proofs: SignatureProof[];
}

export interface KeyPair {
  privateKey: string;
  /** Uncompressed, with the 04 prefix */
  publicKey: string;
  /** DAG address of `publicKey`; this is the account id */
  address: string;
}

export interface VerificationResult {
  /** At least one proof, and every proof checks out */
  isValid: boolean;
  validProofs: SignatureProof[];
  invalidProofs: SignatureProof[];
}
