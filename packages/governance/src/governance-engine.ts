/**
 * Governance Engine
 *
 * Temperature checks and proposals with time-boxed voting. A temperature check
 * is a For/Against straw poll; the owner may elevate it once into a binding
 * proposal whose voters pick one or more of the ballot's vote options.
 *
 * Every public mutator follows the same shape: await the presence or privilege
 * check, then validate and write synchronously. Nothing awaits between reading
 * the vote store and writing to it, so two concurrent votes from one account
 * cannot both pass the "not yet voted" check.
 */

import { addDays, SystemClock, type Clock } from './clock.js';
import { AlreadyRecordedError, NotFoundError, ValidationError, WindowClosedError } from './errors.js';
import { emitSafely, NoopEventSink, type EventSink } from './events.js';
import type { CallerContext, PresenceVerifier, PrivilegedCallGate } from './presence.js';
import {
  GovernanceParametersSchema,
  TemperatureCheckDraftSchema,
  TemperatureCheckVoteSchema,
  VoteOptionIdSchema,
  parseInput,
  type GovernanceParametersInput,
  type TemperatureCheckDraftInput,
} from './schemas.js';
import {
  OPERATIONS,
  type Address,
  type BallotContent,
  type Decimal,
  type GovernanceParameters,
  type Proposal,
  type ProposalVoteRecord,
  type TemperatureCheck,
  type TemperatureCheckVote,
  type TemperatureCheckVoteRecord,
  type Timestamp,
  type VoteOptionId,
} from './types.js';

export interface GovernanceEngineOptions {
  /** Live parameter set used for ballots created from now on */
  parameters: GovernanceParametersInput;
  presence: PresenceVerifier;
  gate: PrivilegedCallGate;
  clock?: Clock;
  events?: EventSink;
}

interface BallotRecord<V> extends BallotContent {
  quorum: Decimal;
  approvalThreshold: Decimal;
  start: Timestamp;
  deadline: Timestamp;
  votes: Map<Address, V>;
}

interface TemperatureCheckRecord extends BallotRecord<TemperatureCheckVote> {
  elevatedProposalId?: number;
}

interface ProposalRecord extends BallotRecord<VoteOptionId[]> {
  temperatureCheckId: number;
}

const SelectionSchema = VoteOptionIdSchema.array();

export class GovernanceEngine {
  private parameters: GovernanceParameters;
  private presence: PresenceVerifier;
  private gate: PrivilegedCallGate;
  private clock: Clock;
  private events: EventSink;

  private temperatureChecks = new Map<number, TemperatureCheckRecord>();
  private temperatureCheckCount = 0;
  private proposals = new Map<number, ProposalRecord>();
  private proposalCount = 0;

  constructor(options: GovernanceEngineOptions) {
    this.parameters = parseInput(GovernanceParametersSchema, options.parameters, 'governance parameters');
    this.presence = options.presence;
    this.gate = options.gate;
    this.clock = options.clock ?? new SystemClock();
    this.events = options.events ?? new NoopEventSink();
  }

  // ==========================================================================
  // Temperature checks
  // ==========================================================================

  /**
   * Open a temperature check from a draft. Voting starts now and runs for the
   * configured number of temperature-check days.
   *
   * @returns the new temperature check id
   */
  createTemperatureCheck(draftInput: TemperatureCheckDraftInput): number {
    const draft = parseInput(TemperatureCheckDraftSchema, draftInput, 'temperature check draft');

    const now = this.clock.now();
    const record: TemperatureCheckRecord = {
      ...copyContent(draft),
      quorum: this.parameters.temperatureCheckQuorum,
      approvalThreshold: this.parameters.temperatureCheckApprovalThreshold,
      start: now,
      deadline: addDays(now, this.parameters.temperatureCheckDays),
      votes: new Map(),
    };

    const id = this.temperatureCheckCount;
    this.temperatureChecks.set(id, record);
    this.temperatureCheckCount += 1;

    console.log(`[governance] Temperature check ${id} created: "${record.title}"`);
    emitSafely(
      this.events,
      {
        type: 'TemperatureCheckCreated',
        timestamp: now,
        temperatureCheckId: id,
        title: record.title,
        quorum: record.quorum,
        approvalThreshold: record.approvalThreshold,
        start: record.start,
        deadline: record.deadline,
      },
      'governance'
    );

    return id;
  }

  async voteOnTemperatureCheck(
    account: Address,
    temperatureCheckId: number,
    vote: TemperatureCheckVote,
    caller: CallerContext
  ): Promise<void> {
    await this.presence.verify(account, OPERATIONS.VOTE_ON_TEMPERATURE_CHECK, { temperatureCheckId, vote }, caller);

    const choice = parseInput(TemperatureCheckVoteSchema, vote, 'temperature check vote');
    const tc = this.requireTemperatureCheck(temperatureCheckId);
    const now = this.clock.now();

    assertVotingOpen(tc, now);
    if (tc.votes.has(account)) {
      throw new AlreadyRecordedError('Account has already voted on this temperature check');
    }

    tc.votes.set(account, choice);

    emitSafely(
      this.events,
      { type: 'TemperatureCheckVoted', timestamp: now, temperatureCheckId, account, vote: choice },
      'governance'
    );
  }

  // ==========================================================================
  // Proposals
  // ==========================================================================

  /**
   * Elevate a temperature check into a proposal. Owner only, at most once per
   * temperature check.
   *
   * @returns the new proposal id
   */
  async elevate(temperatureCheckId: number, caller: CallerContext): Promise<number> {
    await this.gate.authorize(OPERATIONS.ELEVATE, { temperatureCheckId }, caller);

    const tc = this.requireTemperatureCheck(temperatureCheckId);
    if (tc.elevatedProposalId !== undefined) {
      throw new AlreadyRecordedError('Temperature check has already been elevated to a proposal');
    }

    const now = this.clock.now();
    const proposalId = this.proposalCount;
    const proposal: ProposalRecord = {
      ...copyContent(tc),
      quorum: this.parameters.proposalQuorum,
      approvalThreshold: this.parameters.proposalApprovalThreshold,
      start: now,
      deadline: addDays(now, this.parameters.proposalLengthDays),
      temperatureCheckId,
      votes: new Map(),
    };

    tc.elevatedProposalId = proposalId;
    this.proposals.set(proposalId, proposal);
    this.proposalCount += 1;

    console.log(`[governance] Temperature check ${temperatureCheckId} elevated to proposal ${proposalId}`);
    emitSafely(
      this.events,
      {
        type: 'ProposalCreated',
        timestamp: now,
        proposalId,
        temperatureCheckId,
        quorum: proposal.quorum,
        approvalThreshold: proposal.approvalThreshold,
        start: proposal.start,
        deadline: proposal.deadline,
      },
      'governance'
    );

    return proposalId;
  }

  async voteOnProposal(
    account: Address,
    proposalId: number,
    optionIds: VoteOptionId[],
    caller: CallerContext
  ): Promise<void> {
    await this.presence.verify(account, OPERATIONS.VOTE_ON_PROPOSAL, { proposalId, optionIds }, caller);

    const selection = parseInput(SelectionSchema, optionIds, 'vote option selection');
    const proposal = this.requireProposal(proposalId);
    const now = this.clock.now();

    assertVotingOpen(proposal, now);
    assertValidSelection(proposal, selection);
    if (proposal.votes.has(account)) {
      throw new AlreadyRecordedError('Account has already voted on this proposal');
    }

    proposal.votes.set(account, selection);

    emitSafely(
      this.events,
      { type: 'ProposalVoted', timestamp: now, proposalId, account, optionIds: [...selection] },
      'governance'
    );
  }

  // ==========================================================================
  // Parameters
  // ==========================================================================

  getGovernanceParameters(): GovernanceParameters {
    return { ...this.parameters };
  }

  /**
   * Replace the live parameter set. Ballots already created keep the values
   * they were created with.
   */
  async updateGovernanceParameters(input: GovernanceParametersInput, caller: CallerContext): Promise<void> {
    await this.gate.authorize(OPERATIONS.UPDATE_GOVERNANCE_PARAMETERS, { parameters: input }, caller);

    const parameters = parseInput(GovernanceParametersSchema, input, 'governance parameters');
    this.parameters = parameters;

    console.log('[governance] Governance parameters updated');
    emitSafely(
      this.events,
      { type: 'GovernanceParametersUpdated', timestamp: this.clock.now(), parameters: { ...parameters } },
      'governance'
    );
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  getTemperatureCheckCount(): number {
    return this.temperatureCheckCount;
  }

  getProposalCount(): number {
    return this.proposalCount;
  }

  getTemperatureCheck(id: number): TemperatureCheck {
    const tc = this.requireTemperatureCheck(id);
    const view: TemperatureCheck = {
      id,
      ...copyContent(tc),
      quorum: tc.quorum,
      approvalThreshold: tc.approvalThreshold,
      start: tc.start,
      deadline: tc.deadline,
      voteCount: tc.votes.size,
    };
    if (tc.elevatedProposalId !== undefined) {
      view.elevatedProposalId = tc.elevatedProposalId;
    }
    return view;
  }

  getProposal(id: number): Proposal {
    const proposal = this.requireProposal(id);
    return {
      id,
      ...copyContent(proposal),
      quorum: proposal.quorum,
      approvalThreshold: proposal.approvalThreshold,
      start: proposal.start,
      deadline: proposal.deadline,
      temperatureCheckId: proposal.temperatureCheckId,
      voteCount: proposal.votes.size,
    };
  }

  getTemperatureCheckVote(id: number, account: Address): TemperatureCheckVote | undefined {
    return this.requireTemperatureCheck(id).votes.get(account);
  }

  getProposalVote(id: number, account: Address): VoteOptionId[] | undefined {
    const selection = this.requireProposal(id).votes.get(account);
    return selection ? [...selection] : undefined;
  }

  listTemperatureCheckVotes(id: number): TemperatureCheckVoteRecord[] {
    return Array.from(this.requireTemperatureCheck(id).votes, ([account, vote]) => ({ account, vote }));
  }

  listProposalVotes(id: number): ProposalVoteRecord[] {
    return Array.from(this.requireProposal(id).votes, ([account, optionIds]) => ({
      account,
      optionIds: [...optionIds],
    }));
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private requireTemperatureCheck(id: number): TemperatureCheckRecord {
    const tc = this.temperatureChecks.get(id);
    if (!tc) {
      throw new NotFoundError(`Temperature check ${id} not found`);
    }
    return tc;
  }

  private requireProposal(id: number): ProposalRecord {
    const proposal = this.proposals.get(id);
    if (!proposal) {
      throw new NotFoundError(`Proposal ${id} not found`);
    }
    return proposal;
  }
}

function copyContent(source: BallotContent): BallotContent {
  const content: BallotContent = {
    title: source.title,
    description: source.description,
    voteOptions: source.voteOptions.map((option) => ({ ...option })),
    attachments: source.attachments.map((attachment) => ({ ...attachment })),
    rfcUrl: source.rfcUrl,
  };
  if (source.maxSelections !== undefined) {
    content.maxSelections = source.maxSelections;
  }
  return content;
}

/** Voting is open on [start, deadline) */
function assertVotingOpen(ballot: { start: Timestamp; deadline: Timestamp }, now: Timestamp): void {
  if (now < ballot.start) {
    throw new WindowClosedError('Voting has not started yet');
  }
  if (now >= ballot.deadline) {
    throw new WindowClosedError('Voting has ended');
  }
}

function assertValidSelection(proposal: ProposalRecord, selection: VoteOptionId[]): void {
  if (selection.length === 0) {
    throw new ValidationError('At least one vote option must be selected');
  }
  if (new Set(selection).size !== selection.length) {
    throw new ValidationError('Selection contains duplicate vote options');
  }

  const limit = proposal.maxSelections ?? 1;
  if (selection.length > limit) {
    throw new ValidationError(`Too many vote options selected (max ${limit})`);
  }

  const known = new Set(proposal.voteOptions.map((option) => option.id));
  const unknown = selection.find((id) => !known.has(id));
  if (unknown !== undefined) {
    throw new ValidationError(`Invalid vote option: ${unknown}`);
  }
}
