// src/provisioning/executor.ts
import { randomUUID } from 'crypto';
import { ResourceProvider } from '../collaborators';
import { configHash, inputsHash, ResourceGraph } from '../compiler/graph';
import { ResourceUnit, UnitOutputs, UnitParams } from '../compiler/ir';
import { resolveParams } from '../compiler/references';
import {
  DependencyOutputMissingError,
  errorMessage,
  ProviderPermanentError,
  ProviderTransientError,
  StackError
} from '../errors';
import { Logger } from '../logger';
import { StateStore } from '../store/state-store';
import {
  holdsResource,
  PlanArtifact,
  PlannedChange,
  ProvisionedState,
  UnitState,
  UnitStatus
} from './state';

export interface ExecutorOptions {
  environment: string;
  provider: ResourceProvider;
  store: StateStore;
  logger: Logger;
}

export interface PlanResult {
  plan: PlanArtifact;
  ref: string;
}

export interface ApplyResult {
  ok: boolean;
  created: string[];
  updated: string[];
  unchanged: string[];
  removed: string[];
  failedUnit?: string;
  error?: StackError;
  state: ProvisionedState;
}

export interface DestroyResult {
  ok: boolean;
  destroyed: string[];
  skipped: string[];
  failedUnit?: string;
  error?: StackError;
  state: ProvisionedState;
}

/**
 * Anything a provider throws becomes either a retryable or a permanent
 * failure tagged with the unit it happened on.
 */
export function classifyProviderError(err: unknown, unit: string): StackError {
  if (err instanceof ProviderTransientError) {
    return err.unit === unit ? err : new ProviderTransientError(err.message, unit, err);
  }
  if (err instanceof StackError) {
    return err.unit === unit ? err : new ProviderPermanentError(err.message, unit, err);
  }
  return new ProviderPermanentError(errorMessage(err), unit, err);
}

/**
 * Applies and destroys one environment's ResourceGraph, one unit at a time.
 * The state snapshot is saved after every unit transition so an interrupted
 * sweep can be inspected and resumed.
 */
export class ProvisioningExecutor {
  private readonly environment: string;
  private readonly provider: ResourceProvider;
  private readonly store: StateStore;
  private readonly logger: Logger;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(options: ExecutorOptions) {
    this.environment = options.environment;
    this.provider = options.provider;
    this.store = options.store;
    this.logger = options.logger.child({ environment: options.environment });
  }

  async state(): Promise<ProvisionedState> {
    return this.store.loadState(this.environment);
  }

  // plan, apply and destroy each read, modify and write the whole snapshot;
  // they run one at a time per executor.
  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const next = this.tail.then(fn, fn);
    this.tail = next.catch(() => undefined);
    return next;
  }

  plan(graph: ResourceGraph): Promise<PlanResult> {
    return this.exclusive(() => this.computePlan(graph));
  }

  apply(graph: ResourceGraph): Promise<ApplyResult> {
    return this.exclusive(() => this.applyGraph(graph));
  }

  destroy(graph: ResourceGraph): Promise<DestroyResult> {
    return this.exclusive(() => this.destroyGraph(graph));
  }

  private async computePlan(graph: ResourceGraph): Promise<PlanResult> {
    const state = await this.store.loadState(this.environment);
    const changes: PlannedChange[] = [];
    let touched = false;

    for (const unit of graph.order) {
      const current = state.units[unit.name];
      const hash = configHash(unit);

      if (!current) {
        changes.push({ unit: unit.name, kind: unit.kind, action: 'create', reason: 'new unit' });
        state.units[unit.name] = this.unitState(unit, 'planned');
        touched = true;
      } else if (current.status === 'applied') {
        changes.push(
          current.appliedHash === hash
            ? { unit: unit.name, kind: unit.kind, action: 'noop', reason: 'unchanged' }
            : { unit: unit.name, kind: unit.kind, action: 'update', reason: 'configuration changed' }
        );
      } else if (holdsResource(current)) {
        changes.push({
          unit: unit.name,
          kind: unit.kind,
          action: 'update',
          reason: `previous run left unit ${current.status}`
        });
      } else {
        changes.push({
          unit: unit.name,
          kind: unit.kind,
          action: 'create',
          reason: current.status === 'failed' ? 'previous create failed' : `unit is ${current.status}`
        });
        if (current.status === 'absent' || current.status === 'destroyed') {
          this.transition(current, 'planned');
          touched = true;
        }
      }
    }

    for (const orphan of this.orphans(graph, state)) {
      changes.push({
        unit: orphan.name,
        kind: orphan.kind,
        action: 'delete',
        reason: 'no longer declared'
      });
    }

    if (touched) {
      await this.save(state);
    }

    const plan: PlanArtifact = {
      id: randomUUID(),
      environment: this.environment,
      createdAt: new Date().toISOString(),
      changes,
      summary: {
        create: changes.filter((c) => c.action === 'create').length,
        update: changes.filter((c) => c.action === 'update').length,
        delete: changes.filter((c) => c.action === 'delete').length,
        unchanged: changes.filter((c) => c.action === 'noop').length
      }
    };
    const ref = await this.store.savePlan(plan);
    this.logger.info({ planRef: ref, summary: plan.summary }, 'Plan computed');
    return { plan, ref };
  }

  private async applyGraph(graph: ResourceGraph): Promise<ApplyResult> {
    const state = await this.store.loadState(this.environment);
    const result: ApplyResult = {
      ok: true,
      created: [],
      updated: [],
      unchanged: [],
      removed: [],
      state
    };

    for (const unit of graph.order) {
      const hash = configHash(unit);
      const current = state.units[unit.name];
      const entry = current ?? this.unitState(unit, 'absent');
      state.units[unit.name] = entry;

      let dependencyOutputs: Record<string, UnitOutputs>;
      let params: UnitParams;
      try {
        dependencyOutputs = this.dependencyOutputs(unit, state);
        params = resolveParams(unit.name, unit.params, dependencyOutputs);
      } catch (err) {
        if (!(err instanceof DependencyOutputMissingError)) throw err;
        await this.fail(state, entry, err);
        return { ...result, ok: false, failedUnit: unit.name, error: err };
      }
      const inputs = inputsHash(params, dependencyOutputs);

      // A dependency re-created earlier in this sweep may have new outputs.
      if (
        entry.status === 'applied' &&
        entry.appliedHash === hash &&
        entry.appliedInputs === inputs
      ) {
        this.logger.debug({ unit: unit.name }, 'Unit unchanged, skipping');
        result.unchanged.push(unit.name);
        continue;
      }

      entry.kind = unit.kind;
      const isUpdate = holdsResource(entry);

      this.transition(entry, 'applying');
      await this.save(state);
      this.logger.info({ unit: unit.name, kind: unit.kind, update: isUpdate }, 'Applying unit');

      let outputs: UnitOutputs;
      try {
        outputs = await this.provider.create({
          name: unit.name,
          kind: unit.kind,
          params,
          dependencyOutputs
        });
      } catch (err) {
        const error = classifyProviderError(err, unit.name);
        await this.fail(state, entry, error);
        return { ...result, ok: false, failedUnit: unit.name, error };
      }

      entry.outputs = outputs;
      entry.appliedHash = hash;
      entry.appliedInputs = inputs;
      delete entry.lastError;
      this.transition(entry, 'applied');
      await this.save(state);
      (isUpdate ? result.updated : result.created).push(unit.name);
    }

    for (const orphan of this.orphans(graph, state)) {
      const error = await this.destroyUnit(state, orphan);
      if (error) {
        return { ...result, ok: false, failedUnit: orphan.name, error };
      }
      result.removed.push(orphan.name);
    }

    this.logger.info(
      {
        created: result.created.length,
        updated: result.updated.length,
        unchanged: result.unchanged.length,
        removed: result.removed.length
      },
      'Apply finished'
    );
    return result;
  }

  private async destroyGraph(graph: ResourceGraph): Promise<DestroyResult> {
    const state = await this.store.loadState(this.environment);
    const result: DestroyResult = { ok: true, destroyed: [], skipped: [], state };

    const targets: UnitState[] = [...this.orphans(graph, state)];
    for (const unit of graph.reverseOrder()) {
      const current = state.units[unit.name];
      if (current && holdsResource(current)) {
        targets.push(current);
      } else {
        result.skipped.push(unit.name);
      }
    }

    for (const target of targets) {
      const error = await this.destroyUnit(state, target);
      if (error) {
        return { ...result, ok: false, failedUnit: target.name, error };
      }
      result.destroyed.push(target.name);
    }

    this.logger.info({ destroyed: result.destroyed }, 'Destroy finished');
    return result;
  }

  private async destroyUnit(
    state: ProvisionedState,
    entry: UnitState
  ): Promise<StackError | undefined> {
    this.transition(entry, 'destroying');
    await this.save(state);
    this.logger.info({ unit: entry.name, kind: entry.kind }, 'Destroying unit');

    try {
      await this.provider.destroy({
        name: entry.name,
        kind: entry.kind,
        outputs: entry.outputs
      });
    } catch (err) {
      const error = classifyProviderError(err, entry.name);
      await this.fail(state, entry, error);
      return error;
    }

    entry.outputs = {};
    delete entry.appliedHash;
    delete entry.appliedInputs;
    delete entry.lastError;
    this.transition(entry, 'destroyed');
    await this.save(state);
    return undefined;
  }

  private dependencyOutputs(
    unit: ResourceUnit,
    state: ProvisionedState
  ): Record<string, UnitOutputs> {
    const outputs: Record<string, UnitOutputs> = {};
    for (const dep of unit.dependsOn) {
      const depState = state.units[dep];
      if (!depState || depState.status !== 'applied') {
        throw new DependencyOutputMissingError(unit.name, dep);
      }
      outputs[dep] = depState.outputs;
    }
    return outputs;
  }

  // Units still holding resources that the graph no longer declares, most
  // recently added first.
  private orphans(graph: ResourceGraph, state: ProvisionedState): UnitState[] {
    return Object.values(state.units)
      .filter((u) => !graph.has(u.name) && holdsResource(u))
      .reverse();
  }

  private async fail(
    state: ProvisionedState,
    entry: UnitState,
    error: StackError
  ): Promise<void> {
    entry.lastError = { kind: error.kind, message: error.message, unit: entry.name };
    this.transition(entry, 'failed');
    await this.save(state);
    this.logger.error(
      { unit: entry.name, kind: error.kind, retryable: error.retryable, err: error },
      'Unit failed'
    );
  }

  private unitState(unit: ResourceUnit, status: UnitStatus): UnitState {
    return {
      name: unit.name,
      kind: unit.kind,
      status,
      outputs: {},
      updatedAt: new Date().toISOString()
    };
  }

  private transition(entry: UnitState, status: UnitStatus): void {
    entry.status = status;
    entry.updatedAt = new Date().toISOString();
  }

  private async save(state: ProvisionedState): Promise<void> {
    state.updatedAt = new Date().toISOString();
    await this.store.saveState(state);
  }
}
