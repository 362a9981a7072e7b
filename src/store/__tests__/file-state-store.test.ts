import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { FileStateStore } from '../file-state-store';
import { MemoryStateStore } from '../state-store';
import { ConfigurationError } from '../../errors';
import { PipelineRun } from '../../pipeline/types';
import { PlanArtifact, ProvisionedState } from '../../provisioning/state';

function makeRun(id: string, createdAt: string): PipelineRun {
  const stage = { outcome: 'pending' as const, detail: [] };
  return {
    id,
    action: 'deploy',
    environment: 'dev',
    trigger: 'commit',
    status: 'pending',
    stages: { validate: stage, plan: stage, deploy: stage, test: stage, teardown: stage },
    outputs: {},
    createdAt,
    updatedAt: createdAt
  };
}

const STATE: ProvisionedState = {
  environment: 'dev',
  units: {
    store: {
      name: 'store',
      kind: 'object-store',
      status: 'applied',
      outputs: { id: 'fake/store' },
      appliedHash: '0123456789abcdef',
      updatedAt: '2026-01-01T00:00:00.000Z'
    }
  },
  updatedAt: '2026-01-01T00:00:00.000Z'
};

const PLAN: PlanArtifact = {
  id: 'plan-1',
  environment: 'dev',
  createdAt: '2026-01-01T00:00:00.000Z',
  changes: [{ unit: 'store', kind: 'object-store', action: 'create', reason: 'new unit' }],
  summary: { create: 1, update: 0, delete: 0, unchanged: 0 }
};

describe('FileStateStore', () => {
  let dir: string;
  let store: FileStateStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'stackpipe-store-'));
    store = new FileStateStore(dir);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should return an empty state for an unknown environment', async () => {
    const state = await store.loadState('dev');

    expect(state.environment).toBe('dev');
    expect(state.units).toEqual({});
  });

  it('should persist state snapshots as JSON files', async () => {
    await store.saveState(STATE);

    expect(await store.loadState('dev')).toEqual(STATE);
    expect(await fs.readdir(path.join(dir, 'state'))).toEqual(['dev.json']);
  });

  it('should encode environment names into file names', async () => {
    await store.saveState({ ...STATE, environment: 'team/a' });

    expect(await fs.readdir(path.join(dir, 'state'))).toEqual(['team%2Fa.json']);
    expect((await store.loadState('team/a')).units.store.status).toBe('applied');
  });

  it('should return the plan file path as its reference', async () => {
    const ref = await store.savePlan(PLAN);

    expect(ref).toBe(path.join(dir, 'plans', 'plan-1.json'));
    expect(await store.loadPlan(ref)).toEqual(PLAN);
    expect(await store.loadPlan(path.join(dir, 'plans', 'other.json'))).toBeUndefined();
  });

  it('should list runs by creation time', async () => {
    await store.saveRun(makeRun('b', '2026-01-02T00:00:00.000Z'));
    await store.saveRun(makeRun('a', '2026-01-03T00:00:00.000Z'));
    await store.saveRun(makeRun('c', '2026-01-01T00:00:00.000Z'));

    expect((await store.listRuns()).map((r) => r.id)).toEqual(['c', 'b', 'a']);
    expect((await store.loadRun('a'))?.createdAt).toBe('2026-01-03T00:00:00.000Z');
    expect(await store.loadRun('missing')).toBeUndefined();
  });

  it('should list no runs before the first one is saved', async () => {
    expect(await store.listRuns()).toEqual([]);
  });

  it('should reject a state file that is not JSON', async () => {
    await fs.mkdir(path.join(dir, 'state'), { recursive: true });
    await fs.writeFile(path.join(dir, 'state', 'dev.json'), '{ truncated', 'utf-8');

    await expect(store.loadState('dev')).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('should reject a state file that does not match the schema', async () => {
    await fs.mkdir(path.join(dir, 'state'), { recursive: true });
    await fs.writeFile(
      path.join(dir, 'state', 'dev.json'),
      JSON.stringify({ environment: 'dev', units: {} }),
      'utf-8'
    );

    await expect(store.loadState('dev')).rejects.toThrow(
      `Corrupt state file ${path.join(dir, 'state', 'dev.json')}: updatedAt: Required`
    );
  });

  it('should leave no temporary files behind', async () => {
    await store.saveState(STATE);
    await store.saveState({ ...STATE, updatedAt: '2026-01-02T00:00:00.000Z' });

    expect(await fs.readdir(path.join(dir, 'state'))).toEqual(['dev.json']);
  });
});

describe('MemoryStateStore', () => {
  it('should hand out copies', async () => {
    const store = new MemoryStateStore();
    await store.saveState(STATE);

    const loaded = await store.loadState('dev');
    loaded.units.store.status = 'failed';

    expect((await store.loadState('dev')).units.store.status).toBe('applied');
  });

  it('should address plans by a memory reference', async () => {
    const store = new MemoryStateStore();

    const ref = await store.savePlan(PLAN);

    expect(ref).toBe('memory://plans/plan-1');
    expect(await store.loadPlan(ref)).toEqual(PLAN);
  });
});
