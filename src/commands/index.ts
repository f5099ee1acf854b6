/**
 * Command exports
 */

export { verifyCommand, EXIT_FOREIGN, type VerifyCommandData } from './verify.js';
export { claimCommand, type ClaimCommandData } from './claim.js';
export { readManifestInput, readStream } from './input.js';
