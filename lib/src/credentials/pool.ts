/**
 * Credential Pool
 *
 * Holds the configured API keys and decides which one is active. Rate-limited
 * keys cool down for a fixed period; rejected keys are revoked for the rest
 * of the run. Nothing here is persisted, every run starts cold.
 */

import {
  type Clock,
  type Credential,
  type CredentialPoolOptions,
  type CredentialSnapshot,
  type CredentialStatus,
  type RotationReason,
  NoCredentialsAvailableError,
  maskKey,
} from './types.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';

interface CredentialState {
  credential: Credential;
  cooldownUntil: number | null;
  revoked: boolean;
}

export class CredentialPool {
  private readonly states: CredentialState[];
  private readonly cooldownMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private cursor = 0;
  private rotations = 0;

  /**
   * @throws {NoCredentialsAvailableError} If `keys` is empty
   */
  constructor(keys: readonly string[], options: CredentialPoolOptions) {
    if (keys.length === 0) {
      throw new NoCredentialsAvailableError('No API credentials configured');
    }

    this.states = keys.map((key, index) => ({
      credential: Object.freeze({ key, index, label: `#${index + 1} ${maskKey(key)}` }),
      cooldownUntil: null,
      revoked: false,
    }));
    this.cooldownMs = options.cooldownMs;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? getGlobalLogger().child('credentials');
  }

  get size(): number {
    return this.states.length;
  }

  /**
   * Number of rotations performed in this run
   */
  get rotationCount(): number {
    return this.rotations;
  }

  /**
   * The credential under the cursor, usable or not.
   */
  current(): Credential {
    return this.stateAt(this.cursor).credential;
  }

  /**
   * The current credential if it is usable, otherwise the next usable one.
   *
   * @throws {NoCredentialsAvailableError} If every credential is cooling or revoked
   */
  acquire(): Credential {
    const now = this.clock();
    if (this.isUsable(this.stateAt(this.cursor), now)) {
      return this.current();
    }

    const next = this.findUsable(this.cursor + 1, now);
    if (next === undefined) {
      throw this.exhausted(now);
    }

    this.logger.info('Switching credential', {
      from: this.current().label,
      to: this.stateAt(next).credential.label,
    });
    this.cursor = next;
    return this.current();
  }

  /**
   * Puts the current credential aside and moves to the next usable one.
   * A rate limit starts a cooldown; an authentication error revokes the key.
   *
   * @throws {NoCredentialsAvailableError} If no other credential is usable
   */
  rotate(reason: RotationReason): Credential {
    const now = this.clock();
    const state = this.stateAt(this.cursor);

    if (reason === 'rate_limited') {
      state.cooldownUntil = now + this.cooldownMs;
    } else {
      state.revoked = true;
    }

    const next = this.findUsable(this.cursor + 1, now);
    if (next === undefined) {
      this.logger.warn('No credential left to rotate to', {
        credential: state.credential.label,
        reason,
      });
      throw this.exhausted(now);
    }

    this.rotations++;
    this.cursor = next;
    this.logger.info('Rotated credential', {
      from: state.credential.label,
      to: this.current().label,
      reason,
    });
    return this.current();
  }

  /**
   * Points the cursor at the first usable credential in configured order.
   * Cooldowns and revocations are kept.
   */
  resetCursor(): void {
    this.cursor = this.findUsable(0, this.clock()) ?? 0;
  }

  availableCount(): number {
    const now = this.clock();
    return this.states.filter((state) => this.isUsable(state, now)).length;
  }

  snapshot(): CredentialSnapshot[] {
    const now = this.clock();
    return this.states.map((state, index) => ({
      index,
      label: state.credential.label,
      status: this.statusOf(state, now),
      current: index === this.cursor,
      cooldownRemainingMs:
        !state.revoked && state.cooldownUntil !== null
          ? Math.max(0, state.cooldownUntil - now)
          : 0,
    }));
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private stateAt(index: number): CredentialState {
    const state = this.states[index];
    if (!state) {
      throw new RangeError(`Credential index out of range: ${index}`);
    }
    return state;
  }

  private isUsable(state: CredentialState, now: number): boolean {
    return this.statusOf(state, now) === 'available';
  }

  private statusOf(state: CredentialState, now: number): CredentialStatus {
    if (state.revoked) {
      return 'revoked';
    }
    if (state.cooldownUntil !== null && state.cooldownUntil > now) {
      return 'cooling';
    }
    return 'available';
  }

  /**
   * Scans circularly from `start` over every credential once.
   */
  private findUsable(start: number, now: number): number | undefined {
    const n = this.states.length;
    for (let offset = 0; offset < n; offset++) {
      const index = (start + offset) % n;
      if (this.isUsable(this.stateAt(index), now)) {
        return index;
      }
    }
    return undefined;
  }

  private exhausted(now: number): NoCredentialsAvailableError {
    const cooling = this.states.filter((s) => this.statusOf(s, now) === 'cooling').length;
    const revoked = this.states.filter((s) => s.revoked).length;
    return new NoCredentialsAvailableError(
      `All ${this.states.length} credential(s) unavailable (${cooling} cooling, ${revoked} revoked)`
    );
  }
}
