/**
 * Civitas SDK
 *
 * - `metakit` — Signing, canonical encoding and key handling
 * - `civitas` — Presence claims proving an account takes part in a governance call
 *
 * @packageDocumentation
 */

export * from './metakit/index.js';
export * from './civitas/index.js';
