/**
 * Civitas governance core
 *
 * - `GovernanceEngine` — temperature checks, elevation, proposals, voting
 * - `DelegationRegistry` — capped, time-bounded vote delegation
 *
 * @packageDocumentation
 */

export { GovernanceEngine } from './governance-engine.js';
export type { GovernanceEngineOptions } from './governance-engine.js';

export { DelegationRegistry, MAX_DELEGATIONS_PER_DELEGATOR } from './delegation-registry.js';
export type { DelegationRegistryOptions } from './delegation-registry.js';

export {
  GovernanceError,
  ValidationError,
  NotFoundError,
  NotAuthorizedError,
  WindowClosedError,
  AlreadyRecordedError,
  CapExceededError,
  isGovernanceError,
} from './errors.js';
export type { GovernanceErrorCode, ValidationIssue } from './errors.js';

export { SystemClock, ManualClock, addDays, SECONDS_PER_DAY } from './clock.js';
export type { Clock } from './clock.js';

export {
  SignedPresenceVerifier,
  OwnerCallGate,
  DEFAULT_PRESENCE_MAX_AGE_SECONDS,
  DEFAULT_MAX_REMEMBERED_CLAIMS,
} from './presence.js';
export type { CallerContext, PresenceVerifier, PrivilegedCallGate } from './presence.js';

export { NoopEventSink, MemoryEventSink, emitSafely } from './events.js';
export type {
  EventSink,
  GovernanceEvent,
  GovernanceEventType,
  TemperatureCheckCreatedEvent,
  TemperatureCheckVotedEvent,
  ProposalCreatedEvent,
  ProposalVotedEvent,
  GovernanceParametersUpdatedEvent,
  DelegationCreatedEvent,
  DelegationRemovedEvent,
} from './events.js';

export { toUnits, fromUnits, normalizeDecimal, DECIMAL_PLACES } from './decimal.js';

export {
  AddressSchema,
  AttachmentSchema,
  DecimalSchema,
  DecimalStringSchema,
  GovernanceParametersInputSchema,
  GovernanceParametersSchema,
  TemperatureCheckDraftSchema,
  TemperatureCheckVoteSchema,
  TimestampSchema,
  VoteOptionIdSchema,
  VoteOptionSchema,
  MAX_ATTACHMENTS,
  MAX_VOTE_OPTIONS,
  parseInput,
} from './schemas.js';
export type { TemperatureCheckDraft, TemperatureCheckDraftInput, GovernanceParametersInput } from './schemas.js';

export { OPERATIONS } from './types.js';
export type {
  Address,
  Attachment,
  BallotContent,
  Decimal,
  Delegation,
  DelegatorFraction,
  GovernanceParameters,
  Operation,
  Proposal,
  ProposalVoteRecord,
  TemperatureCheck,
  TemperatureCheckVote,
  TemperatureCheckVoteRecord,
  Timestamp,
  VoteOption,
  VoteOptionId,
} from './types.js';
