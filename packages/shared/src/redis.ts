import { Redis } from 'ioredis';
import { getConfig } from './config.js';

// Lazy-loaded Redis connection - only connect when first accessed,
// so a bridge running with EVENT_SINK=none never dials Redis

let _publisher: Redis | null = null;

export function getPublisher(): Redis {
  if (!_publisher) {
    const config = getConfig();
    _publisher = new Redis(config.REDIS_URL);
    _publisher.on('error', (err: Error) => {
      console.error('[Redis publisher]', err.message);
    });
  }
  return _publisher;
}

export async function closePublisher(): Promise<void> {
  if (_publisher) {
    await _publisher.quit();
    _publisher = null;
  }
}

// Event channels
export const CHANNELS = {
  GOVERNANCE_EVENTS: 'governance:events',
  DELEGATION_EVENTS: 'delegation:events',
} as const;

export type Channel = (typeof CHANNELS)[keyof typeof CHANNELS];

// Publish helper
export async function publishEvent<T>(channel: Channel, data: T): Promise<void> {
  await getPublisher().publish(channel, JSON.stringify(data));
}
