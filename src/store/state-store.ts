// src/store/state-store.ts
import { PipelineRun } from '../pipeline/types';
import { emptyState, PlanArtifact, ProvisionedState } from '../provisioning/state';

/**
 * Durable home of ProvisionedState snapshots, plan artifacts and pipeline
 * runs. Everything crossing this boundary is a plain JSON value.
 */
export interface StateStore {
  loadState(environment: string): Promise<ProvisionedState>;
  saveState(state: ProvisionedState): Promise<void>;
  /** Returns a reference that `loadPlan` accepts. */
  savePlan(plan: PlanArtifact): Promise<string>;
  loadPlan(ref: string): Promise<PlanArtifact | undefined>;
  saveRun(run: PipelineRun): Promise<void>;
  loadRun(id: string): Promise<PipelineRun | undefined>;
  listRuns(): Promise<PipelineRun[]>;
}

function clone<T>(value: T): T {
  return structuredClone(value);
}

export class MemoryStateStore implements StateStore {
  private readonly states = new Map<string, ProvisionedState>();
  private readonly plans = new Map<string, PlanArtifact>();
  private readonly runs = new Map<string, PipelineRun>();

  async loadState(environment: string): Promise<ProvisionedState> {
    const state = this.states.get(environment);
    return state ? clone(state) : emptyState(environment);
  }

  async saveState(state: ProvisionedState): Promise<void> {
    this.states.set(state.environment, clone(state));
  }

  async savePlan(plan: PlanArtifact): Promise<string> {
    const ref = `memory://plans/${plan.id}`;
    this.plans.set(ref, clone(plan));
    return ref;
  }

  async loadPlan(ref: string): Promise<PlanArtifact | undefined> {
    const plan = this.plans.get(ref);
    return plan ? clone(plan) : undefined;
  }

  async saveRun(run: PipelineRun): Promise<void> {
    this.runs.set(run.id, clone(run));
  }

  async loadRun(id: string): Promise<PipelineRun | undefined> {
    const run = this.runs.get(id);
    return run ? clone(run) : undefined;
  }

  async listRuns(): Promise<PipelineRun[]> {
    return [...this.runs.values()].map(clone);
  }
}
