/**
 * Delegation Registry
 *
 * Records which fraction of its voting weight an account hands to another
 * account, and until when. Two indexes hold the same facts:
 *
 * - delegators: delegator → ordered list of delegations (primary)
 * - delegatees: delegatee → (delegator → fraction) (reverse view)
 *
 * Both are only ever written through `writeEntry`, so they cannot diverge.
 * Expired entries stay in place until replaced or removed; they simply stop
 * counting toward the cap.
 */

import { z } from 'zod';
import { SystemClock, type Clock } from './clock.js';
import { fromUnits, ONE_UNITS, toUnits, ZERO_UNITS } from './decimal.js';
import { CapExceededError, NotFoundError, ValidationError } from './errors.js';
import { emitSafely, NoopEventSink, type EventSink } from './events.js';
import type { CallerContext, PresenceVerifier } from './presence.js';
import { AddressSchema, DecimalSchema, TimestampSchema, parseInput } from './schemas.js';
import {
  OPERATIONS,
  type Address,
  type Decimal,
  type Delegation,
  type DelegatorFraction,
  type Timestamp,
} from './types.js';

/** Entries a delegator may hold, expired ones included */
export const MAX_DELEGATIONS_PER_DELEGATOR = 50;

export interface DelegationRegistryOptions {
  presence: PresenceVerifier;
  clock?: Clock;
  events?: EventSink;
}

const MakeDelegationSchema = z.object({
  delegator: AddressSchema,
  delegatee: AddressSchema,
  fraction: DecimalSchema,
  validUntil: TimestampSchema,
});

export class DelegationRegistry {
  private presence: PresenceVerifier;
  private clock: Clock;
  private events: EventSink;

  private delegators = new Map<Address, Delegation[]>();
  private delegatees = new Map<Address, Map<Address, Decimal>>();

  constructor(options: DelegationRegistryOptions) {
    this.presence = options.presence;
    this.clock = options.clock ?? new SystemClock();
    this.events = options.events ?? new NoopEventSink();
  }

  /**
   * Delegate `fraction` of the delegator's weight to `delegatee` until
   * `validUntil`. An existing delegation to the same delegatee is replaced.
   */
  async makeDelegation(
    delegator: Address,
    delegatee: Address,
    fraction: Decimal,
    validUntil: Timestamp,
    caller: CallerContext
  ): Promise<Delegation> {
    await this.presence.verify(delegator, OPERATIONS.MAKE_DELEGATION, { delegatee, fraction, validUntil }, caller);

    const input = parseInput(MakeDelegationSchema, { delegator, delegatee, fraction, validUntil }, 'delegation');
    const units = toUnits(input.fraction);

    if (units <= ZERO_UNITS || units > ONE_UNITS) {
      throw new ValidationError('Fraction must be between 0 (exclusive) and 1 (inclusive)');
    }
    if (input.delegator === input.delegatee) {
      throw new ValidationError('Cannot delegate to yourself');
    }

    const now = this.clock.now();
    if (input.validUntil <= now) {
      throw new ValidationError('Delegation must be valid for some time in the future');
    }

    const existing = this.delegators.get(delegator) ?? [];
    const replaced = existing.some((d) => d.delegatee === delegatee);
    if (!replaced && existing.length >= MAX_DELEGATIONS_PER_DELEGATOR) {
      throw new CapExceededError(`A delegator can hold at most ${MAX_DELEGATIONS_PER_DELEGATOR} delegations`);
    }

    const committed = committedUnits(existing, now, delegatee);
    if (committed + units > ONE_UNITS) {
      throw new CapExceededError('Total delegation cannot exceed 100%');
    }

    const delegation: Delegation = { delegatee, fraction: input.fraction, validUntil };
    this.writeEntry(delegator, delegatee, delegation);

    emitSafely(
      this.events,
      { type: 'DelegationCreated', timestamp: now, delegator, delegatee, fraction: input.fraction, validUntil, replaced },
      'delegation'
    );

    return { ...delegation };
  }

  async removeDelegation(delegator: Address, delegatee: Address, caller: CallerContext): Promise<void> {
    await this.presence.verify(delegator, OPERATIONS.REMOVE_DELEGATION, { delegatee }, caller);

    const existing = this.delegators.get(delegator);
    if (!existing || existing.length === 0) {
      throw new NotFoundError('No delegations found for this account');
    }
    if (!existing.some((d) => d.delegatee === delegatee)) {
      throw new NotFoundError('No delegation found to the specified delegatee');
    }

    this.writeEntry(delegator, delegatee, null);

    emitSafely(
      this.events,
      { type: 'DelegationRemoved', timestamp: this.clock.now(), delegator, delegatee },
      'delegation'
    );
  }

  /** All of a delegator's entries, expired ones included */
  getDelegations(delegator: Address): Delegation[] {
    return (this.delegators.get(delegator) ?? []).map((d) => ({ ...d }));
  }

  /** Fraction `delegator` has delegated to `delegatee`, if any */
  getDelegateeDelegators(delegatee: Address, delegator: Address): Decimal | undefined {
    return this.delegatees.get(delegatee)?.get(delegator);
  }

  listDelegateeDelegators(delegatee: Address): DelegatorFraction[] {
    const delegators = this.delegatees.get(delegatee);
    if (!delegators) return [];
    return Array.from(delegators, ([delegator, fraction]) => ({ delegator, fraction }));
  }

  /** Sum of the delegator's fractions still valid at the current time */
  getCommittedFraction(delegator: Address): Decimal {
    return fromUnits(committedUnits(this.delegators.get(delegator) ?? [], this.clock.now()));
  }

  /**
   * Set (or with `null`, clear) the delegator → delegatee entry in both indexes
   */
  private writeEntry(delegator: Address, delegatee: Address, delegation: Delegation | null): void {
    const remaining = (this.delegators.get(delegator) ?? []).filter((d) => d.delegatee !== delegatee);
    const reverse = this.delegatees.get(delegatee) ?? new Map<Address, Decimal>();

    if (delegation) {
      remaining.push(delegation);
      reverse.set(delegator, delegation.fraction);
    } else {
      reverse.delete(delegator);
    }

    if (remaining.length > 0) {
      this.delegators.set(delegator, remaining);
    } else {
      this.delegators.delete(delegator);
    }

    if (reverse.size > 0) {
      this.delegatees.set(delegatee, reverse);
    } else {
      this.delegatees.delete(delegatee);
    }
  }
}

/**
 * Sum of fractions valid strictly after `now`, skipping the entry to `excluding`
 */
function committedUnits(delegations: Delegation[], now: Timestamp, excluding?: Address): bigint {
  return delegations
    .filter((d) => d.validUntil > now && d.delegatee !== excluding)
    .reduce((total, d) => total + toUnits(d.fraction), ZERO_UNITS);
}
