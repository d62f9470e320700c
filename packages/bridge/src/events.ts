/**
 * Redis event sink
 *
 * Fans engine events out over Redis pub/sub so indexers can rebuild tallies.
 * Publishing happens after the operation has committed; a failed publish is
 * logged and dropped.
 */

import { CHANNELS, publishEvent, type Channel } from '@civitas/shared';
import type { EventSink, GovernanceEvent } from '@civitas/governance';

export type Publish = (channel: Channel, event: GovernanceEvent) => Promise<void>;

export function channelFor(event: GovernanceEvent): Channel {
  switch (event.type) {
    case 'DelegationCreated':
    case 'DelegationRemoved':
      return CHANNELS.DELEGATION_EVENTS;
    default:
      return CHANNELS.GOVERNANCE_EVENTS;
  }
}

export class RedisEventSink implements EventSink {
  private publish: Publish;

  constructor(publish: Publish = publishEvent) {
    this.publish = publish;
  }

  emit(event: GovernanceEvent): void {
    const channel = channelFor(event);
    void this.publish(channel, event).catch((err: unknown) => {
      console.error(`[bridge/events] Failed to publish ${event.type} to ${channel}:`, err);
    });
  }
}
