/**
 * Credential Pool Types
 */

import type { Logger } from '../logging/index.js';

// =============================================================================
// Credentials
// =============================================================================

/**
 * An API key as handed out by the pool. The key itself must never be logged;
 * use `label`.
 */
export interface Credential {
  readonly key: string;
  /** Position in the configured order (0-based) */
  readonly index: number;
  /** Masked form of the key for logs */
  readonly label: string;
}

export const RotationReason = {
  RATE_LIMITED: 'rate_limited',
  AUTH_ERROR: 'auth_error',
} as const;

export type RotationReason = (typeof RotationReason)[keyof typeof RotationReason];

export type CredentialStatus = 'available' | 'cooling' | 'revoked';

export interface CredentialSnapshot {
  index: number;
  label: string;
  status: CredentialStatus;
  /** Whether the cursor points at this credential */
  current: boolean;
  /** Remaining cooldown, 0 unless cooling */
  cooldownRemainingMs: number;
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * Milliseconds since the epoch
 */
export type Clock = () => number;

export interface CredentialPoolOptions {
  /** How long a rate-limited credential is excluded from selection */
  cooldownMs: number;
  clock?: Clock | undefined;
  logger?: Logger | undefined;
}

export const DEFAULT_COOLDOWN_MS = 60_000;

// =============================================================================
// Errors
// =============================================================================

export class NoCredentialsAvailableError extends Error {
  readonly code = 'NO_CREDENTIALS_AVAILABLE';

  constructor(message: string) {
    super(message);
    this.name = 'NoCredentialsAvailableError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, NoCredentialsAvailableError);
    }
  }
}

export function isNoCredentialsAvailableError(
  error: unknown
): error is NoCredentialsAvailableError {
  return error instanceof NoCredentialsAvailableError;
}

/**
 * Masks a key as its first and last four characters.
 */
export function maskKey(key: string): string {
  if (key.length <= 8) {
    return '*'.repeat(key.length);
  }
  return `${key.slice(0, 4)}...${key.slice(-4)}`;
}
