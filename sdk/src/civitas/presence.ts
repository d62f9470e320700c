/**
 * Presence claims
 *
 * A presence claim is a short statement, signed by an account's key, that the
 * holder of that key is invoking one specific governance call right now: the
 * operation and its arguments are both signed, and the nonce makes each claim
 * good for a single request. Services check it before letting a request act as
 * that account.
 */

import { randomUUID } from 'crypto';
import type { Signed } from '../metakit/types.js';
import { canonicalize } from '../metakit/canonicalize.js';
import { createSignedObject, verify } from '../metakit/signing.js';
import { getAddress, isValidPrivateKey, isValidPublicKey, keyPairFromPrivateKey } from '../metakit/keys.js';

/**
 * Account identifier: a DAG address.
 */
export type Address = string;

/** Arguments of the call a claim authorizes, compared in canonical JSON form */
export type ClaimArgs = Record<string, unknown>;

export interface PresenceClaim {
  /** Account the caller acts for */
  account: Address;
  /** Operation the claim authorizes, e.g. `vote_on_proposal` */
  operation: string;
  /** Arguments of the call, e.g. `{ proposalId: 0, optionIds: [1] }` */
  args: ClaimArgs;
  /** Random per-claim value; a verifier accepts each nonce once */
  nonce: string;
  /** Unix seconds at which the claim was signed */
  issuedAt: number;
}

export interface PresenceExpectation {
  account: Address;
  operation: string;
  args: ClaimArgs;
  /** Current time, Unix seconds */
  now: number;
  /** Maximum distance between `issuedAt` and `now`, in either direction */
  maxAgeSeconds: number;
}

export type PresenceCheck =
  | { valid: true }
  | { valid: false; reason: string };

/**
 * Sign a presence claim for the account behind `privateKey`
 *
 * @example
 * ```typescript
 * const args = { delegatee, fraction: '0.25', validUntil };
 * const presence = await createPresenceClaim(privateKey, 'make_delegation', args);
 * await fetch(`${bridgeUrl}/delegation`, { method: 'POST', body: JSON.stringify({ delegator, ...args, presence }) });
 * ```
 */
export async function createPresenceClaim(
  privateKey: string,
  operation: string,
  args: ClaimArgs,
  issuedAt: number = Math.floor(Date.now() / 1000)
): Promise<Signed<PresenceClaim>> {
  if (!isValidPrivateKey(privateKey)) {
    throw new Error('Invalid private key: expected 64 hex characters');
  }
  const { address } = keyPairFromPrivateKey(privateKey);
  return createSignedObject<PresenceClaim>(
    { account: address, operation, args, nonce: randomUUID(), issuedAt },
    privateKey
  );
}

/**
 * Check a signed presence claim against what the caller is trying to do
 *
 * Valid when the claim names the expected account, operation and arguments, is
 * fresh, every proof verifies, and at least one proof's key derives to the
 * account. Nonce reuse is the caller's concern.
 */
export async function checkPresenceClaim(
  signed: Signed<PresenceClaim>,
  expected: PresenceExpectation
): Promise<PresenceCheck> {
  const claim = signed.value;

  if (claim.account !== expected.account) {
    return { valid: false, reason: `Claim is for ${claim.account}, not ${expected.account}` };
  }
  if (claim.operation !== expected.operation) {
    return { valid: false, reason: `Claim authorizes ${claim.operation}, not ${expected.operation}` };
  }
  if (canonicalize(claim.args) !== canonicalize(expected.args)) {
    return { valid: false, reason: `Claim was signed for other ${claim.operation} arguments` };
  }
  if (Math.abs(expected.now - claim.issuedAt) > expected.maxAgeSeconds) {
    return { valid: false, reason: 'Claim is stale or issued in the future' };
  }

  const result = await verify(signed);
  if (!result.isValid) {
    return { valid: false, reason: 'Invalid signature' };
  }

  const signedByAccount = result.validProofs.some(
    (proof) => isValidPublicKey(proof.id) && getAddress(proof.id) === claim.account
  );
  if (!signedByAccount) {
    return { valid: false, reason: 'No proof was signed by the claimed account' };
  }

  return { valid: true };
}
