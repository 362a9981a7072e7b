import { describe, it, expect } from 'vitest';
import { EnvironmentLocks } from '../locks';
import { EnvironmentBusyError } from '../../errors';

describe('EnvironmentLocks', () => {
  it('should grant a free environment immediately', async () => {
    const locks = new EnvironmentLocks();

    const release = await locks.acquire('dev', 'run-1');

    expect(locks.holder('dev')).toBe('run-1');
    release();
    expect(locks.holder('dev')).toBeUndefined();
  });

  it('should lock environments independently', async () => {
    const locks = new EnvironmentLocks('reject');

    await locks.acquire('dev', 'run-1');
    await locks.acquire('prod', 'run-2');

    expect(locks.holder('dev')).toBe('run-1');
    expect(locks.holder('prod')).toBe('run-2');
  });

  it('should hand the lock to waiters in arrival order', async () => {
    const locks = new EnvironmentLocks('queue');
    const granted: string[] = [];

    const releaseFirst = await locks.acquire('dev', 'run-1');
    const second = locks.acquire('dev', 'run-2').then((release) => {
      granted.push('run-2');
      return release;
    });
    const third = locks.acquire('dev', 'run-3').then((release) => {
      granted.push('run-3');
      return release;
    });

    expect(locks.queued('dev')).toEqual(['run-2', 'run-3']);

    releaseFirst();
    const releaseSecond = await second;
    expect(granted).toEqual(['run-2']);
    expect(locks.holder('dev')).toBe('run-2');

    releaseSecond();
    const releaseThird = await third;
    expect(granted).toEqual(['run-2', 'run-3']);

    releaseThird();
    expect(locks.holder('dev')).toBeUndefined();
  });

  it('should reject a busy environment in reject mode', async () => {
    const locks = new EnvironmentLocks('reject');
    await locks.acquire('dev', 'run-1');

    await expect(locks.acquire('dev', 'run-2')).rejects.toBeInstanceOf(EnvironmentBusyError);
    await expect(locks.acquire('dev', 'run-2')).rejects.toThrow(
      'Environment "dev" is locked by run run-1.'
    );
  });

  it('should ignore a second release', async () => {
    const locks = new EnvironmentLocks();
    const releaseFirst = await locks.acquire('dev', 'run-1');
    const second = locks.acquire('dev', 'run-2');

    releaseFirst();
    await second;
    releaseFirst();

    expect(locks.holder('dev')).toBe('run-2');
  });
});
