// Shared utilities for Civitas services

export * from './config.js';
export * from './redis.js';
export * from './bridge-client.js';
