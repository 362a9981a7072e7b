// src/pipeline/locks.ts
import { LockMode } from '../config';
import { EnvironmentBusyError } from '../errors';

export type ReleaseLock = () => void;

interface LockEntry {
  holder: string;
  waiters: Array<{ runId: string; grant: () => void }>;
}

/**
 * One exclusive lock per environment identifier. Only the run holding an
 * environment's lock may apply or destroy that environment's resources.
 */
export class EnvironmentLocks {
  private readonly entries = new Map<string, LockEntry>();

  constructor(private readonly mode: LockMode = 'queue') {}

  holder(environment: string): string | undefined {
    return this.entries.get(environment)?.holder;
  }

  queued(environment: string): string[] {
    return (this.entries.get(environment)?.waiters ?? []).map((w) => w.runId);
  }

  /**
   * Resolves once `runId` holds the lock. In `reject` mode a busy
   * environment fails immediately with EnvironmentBusyError; in `queue` mode
   * waiters are granted the lock in arrival order.
   */
  acquire(environment: string, runId: string): Promise<ReleaseLock> {
    const entry = this.entries.get(environment);
    if (!entry) {
      this.entries.set(environment, { holder: runId, waiters: [] });
      return Promise.resolve(this.releaser(environment, runId));
    }

    if (this.mode === 'reject') {
      return Promise.reject(new EnvironmentBusyError(environment, entry.holder));
    }

    return new Promise((resolve) => {
      entry.waiters.push({
        runId,
        grant: () => resolve(this.releaser(environment, runId))
      });
    });
  }

  private releaser(environment: string, runId: string): ReleaseLock {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const entry = this.entries.get(environment);
      if (!entry || entry.holder !== runId) return;

      const next = entry.waiters.shift();
      if (next) {
        entry.holder = next.runId;
        next.grant();
      } else {
        this.entries.delete(environment);
      }
    };
  }
}
