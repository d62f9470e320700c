// Bridge HTTP Client
// Provides typed interface for calling Bridge service endpoints.
// Each `presence` must be signed over the same arguments the call sends.

import { z } from 'zod';
import type { PresenceClaim, Signed } from '@civitas/sdk';
import type {
  Delegation,
  DelegatorFraction,
  GovernanceParameters,
  GovernanceParametersInput,
  Proposal,
  ProposalVoteRecord,
  TemperatureCheck,
  TemperatureCheckDraftInput,
  TemperatureCheckVote,
  TemperatureCheckVoteRecord,
} from '@civitas/governance';
import { getConfig } from './config.js';

export interface BridgeResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

type Presence = Signed<PresenceClaim>;

export interface BridgeCountResponse {
  count: number;
}

export interface BridgeTemperatureCheckVoteResponse {
  temperatureCheckId: number;
  account: string;
  vote: TemperatureCheckVote;
}

export interface BridgeElevateResponse {
  proposalId: number;
  temperatureCheckId: number;
}

export interface BridgeProposalVoteResponse {
  proposalId: number;
  account: string;
  optionIds: number[];
}

export interface BridgeMakeDelegationRequest {
  delegator: string;
  delegatee: string;
  fraction: string;
  validUntil: number;
  presence: Presence;
}

export interface BridgeDelegationResponse extends Delegation {
  delegator: string;
}

export interface BridgeRemoveDelegationResponse {
  delegator: string;
  delegatee: string;
  removed: true;
}

export interface BridgeDelegationsResponse {
  delegator: string;
  delegations: Delegation[];
  committedFraction: string;
}

export interface BridgeDelegateeResponse {
  delegatee: string;
  delegators: DelegatorFraction[];
}

export interface BridgeDelegateeFractionResponse {
  delegatee: string;
  delegator: string;
  fraction: string;
}

const ErrorBodySchema = z.object({ error: z.string() });

type Method = 'GET' | 'POST' | 'PUT' | 'DELETE';

class GovernanceBridgeClient {
  private baseUrl: string;

  constructor(baseUrl?: string) {
    this.baseUrl = baseUrl ?? getConfig().BRIDGE_URL;
  }

  private async request<T>(method: Method, path: string, body?: unknown): Promise<BridgeResponse<T>> {
    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: { 'Content-Type': 'application/json' },
        body: body ? JSON.stringify(body) : undefined,
      });

      const data: unknown = await response.json();

      if (!response.ok) {
        const parsed = ErrorBodySchema.safeParse(data);
        return {
          success: false,
          error: parsed.success ? parsed.data.error : `Bridge returned ${response.status}`,
        };
      }

      return { success: true, data: data as T };
    } catch (err) {
      return {
        success: false,
        error: err instanceof Error ? err.message : 'Bridge request failed',
      };
    }
  }

  // Governance parameters
  async getGovernanceParameters(): Promise<BridgeResponse<GovernanceParameters>> {
    return this.request('GET', '/governance/parameters');
  }

  async updateGovernanceParameters(
    parameters: GovernanceParametersInput,
    presence: Presence
  ): Promise<BridgeResponse<GovernanceParameters>> {
    return this.request('PUT', '/governance/parameters', { parameters, presence });
  }

  // Temperature checks
  async createTemperatureCheck(draft: TemperatureCheckDraftInput): Promise<BridgeResponse<{ id: number }>> {
    return this.request('POST', '/governance/temperature-checks', draft);
  }

  async getTemperatureCheckCount(): Promise<BridgeResponse<BridgeCountResponse>> {
    return this.request('GET', '/governance/temperature-checks/count');
  }

  async getTemperatureCheck(id: number): Promise<BridgeResponse<TemperatureCheck>> {
    return this.request('GET', `/governance/temperature-checks/${id}`);
  }

  async voteOnTemperatureCheck(
    id: number,
    account: string,
    vote: TemperatureCheckVote,
    presence: Presence
  ): Promise<BridgeResponse<BridgeTemperatureCheckVoteResponse>> {
    return this.request('POST', `/governance/temperature-checks/${id}/votes`, { account, vote, presence });
  }

  async listTemperatureCheckVotes(id: number): Promise<BridgeResponse<{ votes: TemperatureCheckVoteRecord[] }>> {
    return this.request('GET', `/governance/temperature-checks/${id}/votes`);
  }

  async elevate(id: number, presence: Presence): Promise<BridgeResponse<BridgeElevateResponse>> {
    return this.request('POST', `/governance/temperature-checks/${id}/elevate`, { presence });
  }

  // Proposals
  async getProposalCount(): Promise<BridgeResponse<BridgeCountResponse>> {
    return this.request('GET', '/governance/proposals/count');
  }

  async getProposal(id: number): Promise<BridgeResponse<Proposal>> {
    return this.request('GET', `/governance/proposals/${id}`);
  }

  async voteOnProposal(
    id: number,
    account: string,
    optionIds: number[],
    presence: Presence
  ): Promise<BridgeResponse<BridgeProposalVoteResponse>> {
    return this.request('POST', `/governance/proposals/${id}/votes`, { account, optionIds, presence });
  }

  async listProposalVotes(id: number): Promise<BridgeResponse<{ votes: ProposalVoteRecord[] }>> {
    return this.request('GET', `/governance/proposals/${id}/votes`);
  }

  // Delegation
  async makeDelegation(req: BridgeMakeDelegationRequest): Promise<BridgeResponse<BridgeDelegationResponse>> {
    return this.request('POST', '/delegation', req);
  }

  async removeDelegation(
    delegator: string,
    delegatee: string,
    presence: Presence
  ): Promise<BridgeResponse<BridgeRemoveDelegationResponse>> {
    return this.request('DELETE', '/delegation', { delegator, delegatee, presence });
  }

  async getDelegations(delegator: string): Promise<BridgeResponse<BridgeDelegationsResponse>> {
    return this.request('GET', `/delegation/${encodeURIComponent(delegator)}`);
  }

  async listDelegateeDelegators(delegatee: string): Promise<BridgeResponse<BridgeDelegateeResponse>> {
    return this.request('GET', `/delegation/delegatees/${encodeURIComponent(delegatee)}`);
  }

  async getDelegateeDelegators(
    delegatee: string,
    delegator: string
  ): Promise<BridgeResponse<BridgeDelegateeFractionResponse>> {
    return this.request(
      'GET',
      `/delegation/delegatees/${encodeURIComponent(delegatee)}/${encodeURIComponent(delegator)}`
    );
  }

  // Health check
  async health(): Promise<BridgeResponse<{ status: string; service: string }>> {
    return this.request('GET', '/health');
  }
}

export { GovernanceBridgeClient };
