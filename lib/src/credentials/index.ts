/**
 * Credentials Module
 */

export {
  type Credential,
  RotationReason,
  type CredentialStatus,
  type CredentialSnapshot,
  type Clock,
  type CredentialPoolOptions,
  DEFAULT_COOLDOWN_MS,
  NoCredentialsAvailableError,
  isNoCredentialsAvailableError,
  maskKey,
} from './types.js';

export { CredentialPool } from './pool.js';
export { collectCredentialsFromEnv } from './env.js';
