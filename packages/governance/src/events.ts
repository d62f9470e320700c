/**
 * Governance events
 *
 * One event per successful mutating operation, emitted after the state change
 * is complete. External indexers rebuild tallies from these.
 */

import type {
  Address,
  Decimal,
  GovernanceParameters,
  TemperatureCheckVote,
  Timestamp,
  VoteOptionId,
} from './types.js';

interface EventBase<T extends string> {
  type: T;
  /** Clock time at which the operation ran */
  timestamp: Timestamp;
}

export interface TemperatureCheckCreatedEvent extends EventBase<'TemperatureCheckCreated'> {
  temperatureCheckId: number;
  title: string;
  quorum: Decimal;
  approvalThreshold: Decimal;
  start: Timestamp;
  deadline: Timestamp;
}

export interface TemperatureCheckVotedEvent extends EventBase<'TemperatureCheckVoted'> {
  temperatureCheckId: number;
  account: Address;
  vote: TemperatureCheckVote;
}

export interface ProposalCreatedEvent extends EventBase<'ProposalCreated'> {
  proposalId: number;
  temperatureCheckId: number;
  quorum: Decimal;
  approvalThreshold: Decimal;
  start: Timestamp;
  deadline: Timestamp;
}

export interface ProposalVotedEvent extends EventBase<'ProposalVoted'> {
  proposalId: number;
  account: Address;
  optionIds: VoteOptionId[];
}

export interface GovernanceParametersUpdatedEvent extends EventBase<'GovernanceParametersUpdated'> {
  parameters: GovernanceParameters;
}

export interface DelegationCreatedEvent extends EventBase<'DelegationCreated'> {
  delegator: Address;
  delegatee: Address;
  fraction: Decimal;
  validUntil: Timestamp;
  /** True when an earlier delegation to the same delegatee was replaced */
  replaced: boolean;
}

export interface DelegationRemovedEvent extends EventBase<'DelegationRemoved'> {
  delegator: Address;
  delegatee: Address;
}

export type GovernanceEvent =
  | TemperatureCheckCreatedEvent
  | TemperatureCheckVotedEvent
  | ProposalCreatedEvent
  | ProposalVotedEvent
  | GovernanceParametersUpdatedEvent
  | DelegationCreatedEvent
  | DelegationRemovedEvent;

export type GovernanceEventType = GovernanceEvent['type'];

export interface EventSink {
  emit(event: GovernanceEvent): void;
}

export class NoopEventSink implements EventSink {
  emit(_event: GovernanceEvent): void {}
}

/** Keeps every event in order; used by tests and local tooling */
export class MemoryEventSink implements EventSink {
  readonly events: GovernanceEvent[] = [];

  emit(event: GovernanceEvent): void {
    this.events.push(event);
  }

  ofType<T extends GovernanceEventType>(type: T): Extract<GovernanceEvent, { type: T }>[] {
    return this.events.filter((event): event is Extract<GovernanceEvent, { type: T }> => event.type === type);
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * Deliver an event without letting a faulty sink undo a committed operation
 */
export function emitSafely(sink: EventSink, event: GovernanceEvent, component: string): void {
  try {
    sink.emit(event);
  } catch (err) {
    console.error(`[${component}] Failed to emit ${event.type}:`, err);
  }
}
