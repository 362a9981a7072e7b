// src/store/file-state-store.ts
import { promises as fs } from 'fs';
import path from 'path';
import { ZodType } from 'zod';
import { formatIssues } from '../compiler/parser';
import { ConfigurationError, errorMessage } from '../errors';
import { PipelineRun } from '../pipeline/types';
import { emptyState, PlanArtifact, ProvisionedState } from '../provisioning/state';
import { planArtifactSchema, pipelineRunSchema, provisionedStateSchema } from './schemas';
import { StateStore } from './state-store';

/**
 * JSON files under one directory:
 *
 *   <dir>/state/<environment>.json
 *   <dir>/plans/<plan-id>.json
 *   <dir>/runs/<run-id>.json
 *
 * Writes go to a temp file first and are renamed into place, so a crash
 * mid-write never leaves a truncated snapshot behind.
 */
export class FileStateStore implements StateStore {
  constructor(private readonly dir: string) {}

  private file(kind: 'state' | 'plans' | 'runs', id: string): string {
    return path.join(this.dir, kind, `${encodeURIComponent(id)}.json`);
  }

  private async write(file: string, value: unknown): Promise<void> {
    await fs.mkdir(path.dirname(file), { recursive: true });
    const tmp = `${file}.${process.pid}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(value, null, 2) + '\n', 'utf-8');
    await fs.rename(tmp, file);
  }

  private async read<T>(file: string, schema: ZodType<T>): Promise<T | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return undefined;
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new ConfigurationError(`Corrupt state file ${file}: ${errorMessage(err)}`);
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new ConfigurationError(
        `Corrupt state file ${file}: ${formatIssues(result.error.issues)}`
      );
    }
    return result.data;
  }

  async loadState(environment: string): Promise<ProvisionedState> {
    const state = await this.read(this.file('state', environment), provisionedStateSchema);
    return state ?? emptyState(environment);
  }

  async saveState(state: ProvisionedState): Promise<void> {
    await this.write(this.file('state', state.environment), state);
  }

  async savePlan(plan: PlanArtifact): Promise<string> {
    const file = this.file('plans', plan.id);
    await this.write(file, plan);
    return file;
  }

  async loadPlan(ref: string): Promise<PlanArtifact | undefined> {
    return this.read(ref, planArtifactSchema);
  }

  async saveRun(run: PipelineRun): Promise<void> {
    await this.write(this.file('runs', run.id), run);
  }

  async loadRun(id: string): Promise<PipelineRun | undefined> {
    return this.read(this.file('runs', id), pipelineRunSchema);
  }

  async listRuns(): Promise<PipelineRun[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(path.join(this.dir, 'runs'));
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return [];
      }
      throw err;
    }

    const runs: PipelineRun[] = [];
    for (const entry of entries.filter((e) => e.endsWith('.json')).sort()) {
      const run = await this.read(path.join(this.dir, 'runs', entry), pipelineRunSchema);
      if (run) runs.push(run);
    }
    return runs.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }
}
