// Governance domain types

import type { z } from 'zod';
import type { Address } from '@civitas/sdk';
import type { Decimal } from './decimal.js';
import type { Timestamp } from './clock.js';
import type {
  AttachmentSchema,
  GovernanceParametersSchema,
  TemperatureCheckVoteSchema,
  VoteOptionSchema,
} from './schemas.js';

export type { Address, Decimal, Timestamp };

export type VoteOptionId = number;
export type VoteOption = z.output<typeof VoteOptionSchema>;
export type Attachment = z.output<typeof AttachmentSchema>;
export type TemperatureCheckVote = z.output<typeof TemperatureCheckVoteSchema>;
export type GovernanceParameters = z.output<typeof GovernanceParametersSchema>;

/** Fields a temperature check hands on to the proposal it is elevated into */
export interface BallotContent {
  title: string;
  description: string;
  voteOptions: VoteOption[];
  attachments: Attachment[];
  rfcUrl: string;
  /** Absent: exactly one selection. Present: up to this many. */
  maxSelections?: number;
}

interface BallotWindow {
  quorum: Decimal;
  approvalThreshold: Decimal;
  start: Timestamp;
  deadline: Timestamp;
}

export interface TemperatureCheck extends BallotContent, BallotWindow {
  id: number;
  elevatedProposalId?: number;
  voteCount: number;
}

export interface Proposal extends BallotContent, BallotWindow {
  id: number;
  temperatureCheckId: number;
  voteCount: number;
}

export interface TemperatureCheckVoteRecord {
  account: Address;
  vote: TemperatureCheckVote;
}

export interface ProposalVoteRecord {
  account: Address;
  optionIds: VoteOptionId[];
}

export interface Delegation {
  delegatee: Address;
  fraction: Decimal;
  validUntil: Timestamp;
}

export interface DelegatorFraction {
  delegator: Address;
  fraction: Decimal;
}

/**
 * Operation names, as signed into presence claims and reported in events
 */
export const OPERATIONS = {
  VOTE_ON_TEMPERATURE_CHECK: 'vote_on_temperature_check',
  ELEVATE: 'elevate',
  VOTE_ON_PROPOSAL: 'vote_on_proposal',
  UPDATE_GOVERNANCE_PARAMETERS: 'update_governance_parameters',
  MAKE_DELEGATION: 'make_delegation',
  REMOVE_DELEGATION: 'remove_delegation',
} as const;

export type Operation = (typeof OPERATIONS)[keyof typeof OPERATIONS];
