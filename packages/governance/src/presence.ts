/**
 * Presence and privilege checks
 *
 * The engines never decide who a caller is. They hand the opaque
 * CallerContext to a PresenceVerifier (acting as an account) or a
 * PrivilegedCallGate (owner-only operations), together with the arguments of
 * the call, and proceed only if it resolves.
 */

import { checkPresenceClaim, type ClaimArgs, type PresenceClaim, type Signed } from '@civitas/sdk';
import type { Clock } from './clock.js';
import { NotAuthorizedError } from './errors.js';
import type { Address, Operation } from './types.js';

export interface CallerContext {
  /** Presence claim signed by the account the caller acts for */
  presence?: Signed<PresenceClaim>;
}

export interface PresenceVerifier {
  /** Resolves if `caller` acts for `account` in `operation` with `args`; rejects with NotAuthorizedError otherwise */
  verify(account: Address, operation: Operation, args: ClaimArgs, caller: CallerContext): Promise<void>;
}

export interface PrivilegedCallGate {
  /** Resolves if `caller` is the designated principal */
  authorize(operation: Operation, args: ClaimArgs, caller: CallerContext): Promise<void>;
}

export const DEFAULT_PRESENCE_MAX_AGE_SECONDS = 300;
export const DEFAULT_MAX_REMEMBERED_CLAIMS = 10_000;

/**
 * Accepts callers carrying a fresh, correctly signed presence claim for the
 * account, operation and arguments. Each claim is accepted once: its nonce is
 * remembered until the claim would have gone stale anyway, and past
 * `maxRememberedClaims` the oldest nonces are forgotten first.
 */
export class SignedPresenceVerifier implements PresenceVerifier {
  private clock: Clock;
  private maxAgeSeconds: number;
  private maxRememberedClaims: number;
  /** `account:nonce` -> time after which the claim is stale */
  private usedClaims = new Map<string, number>();

  constructor(
    clock: Clock,
    maxAgeSeconds: number = DEFAULT_PRESENCE_MAX_AGE_SECONDS,
    maxRememberedClaims: number = DEFAULT_MAX_REMEMBERED_CLAIMS
  ) {
    this.clock = clock;
    this.maxAgeSeconds = maxAgeSeconds;
    this.maxRememberedClaims = maxRememberedClaims;
  }

  async verify(account: Address, operation: Operation, args: ClaimArgs, caller: CallerContext): Promise<void> {
    if (!caller.presence) {
      throw new NotAuthorizedError(`Presence proof required to act as ${account}`);
    }

    const check = await checkPresenceClaim(caller.presence, {
      account,
      operation,
      args,
      now: this.clock.now(),
      maxAgeSeconds: this.maxAgeSeconds,
    });

    if (!check.valid) {
      throw new NotAuthorizedError(`Presence of ${account} not proven: ${check.reason}`);
    }

    // Lookup and insert with no await in between
    const claim = caller.presence.value;
    const key = `${claim.account}:${claim.nonce}`;
    this.forgetStaleClaims();
    if (this.usedClaims.has(key)) {
      throw new NotAuthorizedError(`Presence of ${account} not proven: Claim has already been used`);
    }
    this.usedClaims.set(key, claim.issuedAt + this.maxAgeSeconds);
  }

  /** Number of nonces currently remembered */
  get rememberedClaims(): number {
    return this.usedClaims.size;
  }

  private forgetStaleClaims(): void {
    const now = this.clock.now();
    for (const [key, staleAfter] of this.usedClaims) {
      if (staleAfter < now) {
        this.usedClaims.delete(key);
      }
    }
    // Map iteration follows insertion order
    for (const key of this.usedClaims.keys()) {
      if (this.usedClaims.size < this.maxRememberedClaims) break;
      this.usedClaims.delete(key);
    }
  }
}

/**
 * Restricts privileged operations to one owner account
 */
export class OwnerCallGate implements PrivilegedCallGate {
  private owner: Address;
  private presence: PresenceVerifier;

  constructor(owner: Address, presence: PresenceVerifier) {
    this.owner = owner;
    this.presence = presence;
  }

  async authorize(operation: Operation, args: ClaimArgs, caller: CallerContext): Promise<void> {
    try {
      await this.presence.verify(this.owner, operation, args, caller);
    } catch (err) {
      if (err instanceof NotAuthorizedError) {
        throw new NotAuthorizedError(`${operation} is restricted to the owner`);
      }
      throw err;
    }
  }
}
