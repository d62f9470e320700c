export type { Address, ClaimArgs, PresenceClaim, PresenceExpectation, PresenceCheck } from './presence.js';
export { createPresenceClaim, checkPresenceClaim } from './presence.js';
