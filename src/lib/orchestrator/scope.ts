/**
 * Resource Scope
 *
 * Holds the ephemeral resources of one render and releases them in reverse
 * order of acquisition. Once released, the scope stays closed: anything
 * registered afterwards (an acquisition that finished after a deadline) is
 * released immediately.
 */

import { errorMessage } from '../errors/index.js';

export interface ReleaseFailure {
  name: string;
  error: unknown;
}

interface Entry {
  name: string;
  release: () => Promise<void>;
}

export class ResourceScope {
  private entries: Entry[] = [];
  private closed = false;

  constructor(private onLateFailure: (failure: ReleaseFailure) => void) {}

  get isClosed(): boolean {
    return this.closed;
  }

  /** Names of held resources, oldest first */
  get held(): string[] {
    return this.entries.map(entry => entry.name);
  }

  async defer(name: string, release: () => Promise<void>): Promise<void> {
    if (!this.closed) {
      this.entries.push({ name, release });
      return;
    }
    try {
      await release();
    } catch (error) {
      this.onLateFailure({ name, error });
    }
  }

  /**
   * Release everything, newest first. Every release runs even when an
   * earlier one fails; failures are returned, not thrown.
   */
  async release(): Promise<ReleaseFailure[]> {
    this.closed = true;
    const failures: ReleaseFailure[] = [];

    while (this.entries.length > 0) {
      const entry = this.entries.pop();
      if (!entry) break;
      try {
        await entry.release();
      } catch (error) {
        failures.push({ name: entry.name, error });
      }
    }
    return failures;
  }
}

export function describeReleaseFailure(failure: ReleaseFailure): string {
  return `${failure.name}: ${errorMessage(failure.error)}`;
}
