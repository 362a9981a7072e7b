// src/pipeline/orchestrator.ts
import { randomUUID } from 'crypto';
import {
  CheckResult,
  EndpointDeployer,
  EndpointProbe,
  ModelTrainer,
  ResourceProvider,
  TestSuite
} from '../collaborators';
import { ResourceGraph } from '../compiler/graph';
import { EnvironmentPolicy, StackIR, UnitOutputs } from '../compiler/ir';
import { DeployTargets, validateStack } from '../compiler/validate';
import {
  errorMessage,
  InvalidRunStateError,
  RunNotFoundError,
  StackError,
  UnknownEnvironmentError
} from '../errors';
import { createChildLogger, Logger } from '../logger';
import { DestroyResult, ProvisioningExecutor } from '../provisioning/executor';
import { ProvisionedState } from '../provisioning/state';
import { StateStore } from '../store/state-store';
import { ApprovalGate } from './approvals';
import { EnvironmentLocks } from './locks';
import {
  DeploySubStep,
  isTerminal,
  PipelineRun,
  RunFailure,
  Stage,
  StageOutcome,
  STAGES,
  TriggerRequest
} from './types';

export interface OrchestratorOptions {
  stack: StackIR;
  provider: ResourceProvider;
  trainer: ModelTrainer;
  deployer: EndpointDeployer;
  store: StateStore;
  logger: Logger;
  probe?: EndpointProbe;
  testSuite?: TestSuite;
  locks?: EnvironmentLocks;
  approvals?: ApprovalGate;
}

type DeployOutcome = 'continue' | 'halt' | 'plan-only';

type StepResult<T> = { ok: true; value: T } | { ok: false };

function now(): string {
  return new Date().toISOString();
}

function initialStages(): PipelineRun['stages'] {
  return {
    validate: { outcome: 'pending', detail: [] },
    plan: { outcome: 'pending', detail: [] },
    deploy: { outcome: 'pending', detail: [] },
    test: { outcome: 'pending', detail: [] },
    teardown: { outcome: 'pending', detail: [] }
  };
}

function failureFrom(err: unknown): Omit<RunFailure, 'stage'> {
  if (err instanceof StackError) return err.toDetails();
  return { kind: 'StepFailed', message: errorMessage(err) };
}

function appliedOutputs(
  state: ProvisionedState,
  graph: ResourceGraph
): Record<string, UnitOutputs> {
  const outputs: Record<string, UnitOutputs> = {};
  for (const name of graph.names) {
    const unit = state.units[name];
    if (unit && unit.status === 'applied') outputs[name] = unit.outputs;
  }
  return outputs;
}

/**
 * Drives PipelineRuns through validate → plan → deploy → test, or
 * validate → teardown for teardown runs. Stages of one run are strictly
 * sequential; apply and destroy for an environment are serialized through
 * EnvironmentLocks.
 */
export class PipelineOrchestrator {
  private readonly stack: StackIR;
  private readonly provider: ResourceProvider;
  private readonly trainer: ModelTrainer;
  private readonly deployer: EndpointDeployer;
  private readonly store: StateStore;
  private readonly logger: Logger;
  private readonly probe?: EndpointProbe;
  private readonly testSuite?: TestSuite;
  private readonly locks: EnvironmentLocks;
  private readonly approvals: ApprovalGate;
  private readonly executors = new Map<string, ProvisioningExecutor>();
  private readonly runs = new Map<string, PipelineRun>();

  constructor(options: OrchestratorOptions) {
    this.stack = options.stack;
    this.provider = options.provider;
    this.trainer = options.trainer;
    this.deployer = options.deployer;
    this.store = options.store;
    this.logger = options.logger;
    this.probe = options.probe;
    this.testSuite = options.testSuite;
    this.locks = options.locks ?? new EnvironmentLocks();
    this.approvals = options.approvals ?? new ApprovalGate();
  }

  executorFor(environment: string): ProvisioningExecutor {
    let executor = this.executors.get(environment);
    if (!executor) {
      executor = new ProvisioningExecutor({
        environment,
        provider: this.provider,
        store: this.store,
        logger: this.logger
      });
      this.executors.set(environment, executor);
    }
    return executor;
  }

  resolveEnvironment(request: Pick<TriggerRequest, 'environment' | 'branch'>): string {
    if (request.environment !== undefined) {
      if (!(request.environment in this.stack.environments)) {
        throw new UnknownEnvironmentError(`Unknown environment "${request.environment}".`);
      }
      return request.environment;
    }
    if (request.branch !== undefined) {
      const environment = this.stack.branches[request.branch];
      if (environment === undefined) {
        throw new UnknownEnvironmentError(
          `Branch "${request.branch}" is not mapped to an environment.`
        );
      }
      return environment;
    }
    throw new UnknownEnvironmentError('A trigger needs an environment or a branch.');
  }

  async trigger(request: TriggerRequest): Promise<PipelineRun> {
    const environment = this.resolveEnvironment(request);
    const createdAt = now();
    const run: PipelineRun = {
      id: randomUUID(),
      action: request.action ?? 'deploy',
      environment,
      trigger: request.trigger,
      status: 'pending',
      stages: initialStages(),
      outputs: {},
      createdAt,
      updatedAt: createdAt
    };
    if (request.branch !== undefined) run.branch = request.branch;

    this.runs.set(run.id, run);
    await this.persist(run);
    this.logger.info(
      { runId: run.id, environment, action: run.action, trigger: run.trigger },
      'Pipeline run created'
    );
    return structuredClone(run);
  }

  async start(request: TriggerRequest): Promise<PipelineRun> {
    const run = await this.trigger(request);
    return this.execute(run.id);
  }

  async getRun(runId: string): Promise<PipelineRun> {
    const live = this.runs.get(runId);
    if (live) return structuredClone(live);
    const stored = await this.store.loadRun(runId);
    if (!stored) throw new RunNotFoundError(runId);
    return stored;
  }

  listRuns(): Promise<PipelineRun[]> {
    return this.store.listRuns();
  }

  approve(runId: string): Promise<void> {
    return this.signal(runId, 'approve');
  }

  reject(runId: string): Promise<void> {
    return this.signal(runId, 'reject');
  }

  /** Cancellation is only possible while a run waits for approval. */
  cancel(runId: string): Promise<void> {
    return this.signal(runId, 'reject');
  }

  private async signal(runId: string, action: 'approve' | 'reject'): Promise<void> {
    const run = this.runs.get(runId) ?? (await this.store.loadRun(runId));
    if (!run) throw new RunNotFoundError(runId);
    const delivered =
      run.status === 'awaiting-approval' &&
      (action === 'approve' ? this.approvals.approve(runId) : this.approvals.reject(runId));
    if (!delivered) {
      // Approval waits live in memory; a run persisted as waiting by an
      // earlier process has nothing left to resume.
      const reason =
        run.status === 'awaiting-approval'
          ? `Run ${runId} was awaiting approval in a process that has since stopped; trigger a new run.`
          : `Run ${runId} is ${run.status}; only runs awaiting approval can be approved or rejected.`;
      throw new InvalidRunStateError(reason);
    }
    this.logger.info(
      { runId, environment: run.environment },
      action === 'approve' ? 'Run approved' : 'Run rejected'
    );
  }

  /**
   * Runs a pending run to a terminal status. Only runs still in progress are
   * kept in memory; finished ones are served from the store.
   */
  async execute(runId: string): Promise<PipelineRun> {
    const run = this.runs.get(runId) ?? (await this.store.loadRun(runId));
    if (!run) throw new RunNotFoundError(runId);
    if (run.status !== 'pending') {
      throw new InvalidRunStateError(`Run ${runId} is ${run.status}, not pending.`);
    }
    this.runs.set(runId, run);

    try {
      await this.drive(run);
    } finally {
      if (isTerminal(run.status)) this.runs.delete(runId);
    }
    return structuredClone(run);
  }

  private async drive(run: PipelineRun): Promise<void> {
    const log = createChildLogger(this.logger, { runId: run.id, environment: run.environment });
    run.status = 'running';
    await this.persist(run);

    const validated = await this.validate(run, log);
    if (!validated) return;

    if (run.action === 'teardown') {
      await this.skip(run, ['plan', 'deploy', 'test'], 'teardown run');
      await this.teardown(run, validated.graph, log);
      return;
    }

    await this.skip(run, ['teardown'], 'teardown only runs on explicit trigger');

    if (!(await this.plan(run, validated.graph, log))) return;

    const deployed = await this.deploy(run, validated.graph, validated.targets, log);
    if (deployed === 'halt') return;
    if (deployed === 'continue') {
      if (!(await this.test(run, validated.graph, validated.targets, log))) return;
    }

    run.status = 'succeeded';
    await this.persist(run);
    log.info('Pipeline run succeeded');
  }

  private async validate(
    run: PipelineRun,
    log: Logger
  ): Promise<{ graph: ResourceGraph; targets: DeployTargets } | undefined> {
    await this.begin(run, 'validate');
    const result = validateStack(this.stack);

    const detail = result.violations.map(
      (v) => `${v.id} @ ${v.unitName} (${v.severity})`
    );
    run.stages.validate.detail.push(...detail);

    if (result.error || !result.graph || !result.targets) {
      await this.fail(run, 'validate', failureFrom(result.error), log);
      return undefined;
    }

    run.stages.validate.detail.push(`order: ${result.graph.names.join(' -> ')}`);
    await this.finish(run, 'validate', 'success');
    return { graph: result.graph, targets: result.targets };
  }

  private async plan(run: PipelineRun, graph: ResourceGraph, log: Logger): Promise<boolean> {
    await this.begin(run, 'plan');
    try {
      const { plan, ref } = await this.executorFor(run.environment).plan(graph);
      run.planRef = ref;
      const { summary } = plan;
      run.stages.plan.detail.push(
        `${summary.create} to create, ${summary.update} to update, ` +
          `${summary.delete} to delete, ${summary.unchanged} unchanged`
      );
    } catch (err) {
      await this.fail(run, 'plan', failureFrom(err), log);
      return false;
    }
    await this.finish(run, 'plan', 'success');
    return true;
  }

  private policy(run: PipelineRun): EnvironmentPolicy {
    return this.stack.environments[run.environment];
  }

  private async deploy(
    run: PipelineRun,
    graph: ResourceGraph,
    targets: DeployTargets,
    log: Logger
  ): Promise<DeployOutcome> {
    await this.begin(run, 'deploy');
    const policy = this.policy(run);

    if (policy.requiresManualApproval) {
      const pending = this.approvals.wait(run.id, policy.approvalTimeoutMs);
      run.status = 'awaiting-approval';
      run.stages.deploy.outcome = 'awaiting-approval';
      await this.persist(run);
      log.info({ timeoutMs: policy.approvalTimeoutMs }, 'Waiting for approval');

      const decision = await pending;
      if (decision !== 'approved') {
        run.status = 'cancelled';
        run.failure = {
          stage: 'deploy',
          kind: decision === 'rejected' ? 'ApprovalRejected' : 'ApprovalTimeout',
          message:
            decision === 'rejected'
              ? 'Deployment was rejected.'
              : `No approval within ${policy.approvalTimeoutMs ?? 0} ms.`
        };
        await this.finish(run, 'deploy', 'skipped', `approval ${decision}`);
        await this.skip(run, ['test'], 'run cancelled');
        log.warn({ decision }, 'Pipeline run cancelled');
        return 'halt';
      }

      run.status = 'running';
      run.stages.deploy.outcome = 'pending';
      run.stages.deploy.detail.push('approved');
      await this.persist(run);
    } else if (!policy.autoDeploy) {
      await this.finish(run, 'deploy', 'skipped', 'environment does not deploy automatically');
      await this.skip(run, ['test'], 'nothing deployed');
      return 'plan-only';
    }

    let release: () => void;
    try {
      release = await this.locks.acquire(run.environment, run.id);
    } catch (err) {
      await this.fail(run, 'deploy', failureFrom(err), log);
      return 'halt';
    }

    try {
      const sweep = await this.step(run, 'apply', log, () =>
        this.executorFor(run.environment).apply(graph)
      );
      if (!sweep.ok) return 'halt';
      const applied = sweep.value;
      run.outputs = appliedOutputs(applied.state, graph);
      if (!applied.ok) {
        await this.fail(
          run,
          'deploy',
          { ...failureFrom(applied.error), unit: applied.failedUnit, subStep: 'apply' },
          log
        );
        return 'halt';
      }
      run.stages.deploy.detail.push(
        `apply: ${applied.created.length} created, ${applied.updated.length} updated, ` +
          `${applied.unchanged.length} unchanged, ${applied.removed.length} removed`
      );

      const storeOutputs = run.outputs[targets.artifactStore.name] ?? {};
      const endpointOutputs = run.outputs[targets.endpoint.name] ?? {};

      const trained = await this.step(run, 'train', log, () => this.trainer.train());
      if (!trained.ok) return 'halt';
      const metrics = Object.entries(trained.value.metrics)
        .map(([k, v]) => `${k}=${v}`)
        .join(', ');
      run.stages.deploy.detail.push(`train: ${metrics || 'no metrics'}`);

      const published = await this.step(run, 'publish', log, () =>
        this.trainer.publish(trained.value.artifact, storeOutputs)
      );
      if (!published.ok) return 'halt';
      run.artifactUri = published.value;
      run.stages.deploy.detail.push(`publish: ${published.value}`);

      const deployed = await this.step(run, 'deploy-endpoint', log, () =>
        this.deployer.deploy(this.stack.deploy.codePackage, endpointOutputs)
      );
      if (!deployed.ok) return 'halt';
      run.stages.deploy.detail.push(`deploy-endpoint: ${this.stack.deploy.codePackage}`);
    } finally {
      release();
    }

    await this.finish(run, 'deploy', 'success');
    return 'continue';
  }

  private async step<T>(
    run: PipelineRun,
    subStep: DeploySubStep,
    log: Logger,
    fn: () => Promise<T>
  ): Promise<StepResult<T>> {
    try {
      return { ok: true, value: await fn() };
    } catch (err) {
      await this.fail(run, 'deploy', { ...failureFrom(err), subStep }, log);
      return { ok: false };
    }
  }

  private async test(
    run: PipelineRun,
    graph: ResourceGraph,
    targets: DeployTargets,
    log: Logger
  ): Promise<boolean> {
    await this.begin(run, 'test');
    const detail = run.stages.test.detail;
    const failures: string[] = [];

    for (const unit of graph.order) {
      try {
        const health = await this.provider.describe(unit.kind, unit.name);
        if (health !== 'healthy') failures.push(`infrastructure:${unit.name} is ${health}`);
      } catch (err) {
        failures.push(`infrastructure:${unit.name} ${errorMessage(err)}`);
      }
    }
    detail.push(`infrastructure: ${graph.order.length} unit(s) checked`);

    const endpointOutputs = run.outputs[targets.endpoint.name] ?? {};
    const probe = this.probe;
    if (probe) {
      const checks = [() => probe.checkHealth(endpointOutputs)];
      const features = this.stack.test.predictFeatures;
      if (features) checks.push(() => probe.checkPrediction(endpointOutputs, features));

      for (const check of checks) {
        const result = await this.runCheck(check);
        detail.push(`${result.name}: ${result.passed ? 'passed' : 'failed'}`);
        if (!result.passed) {
          failures.push(`functional:${result.name}${result.detail ? ` ${result.detail}` : ''}`);
        }
      }
    } else {
      detail.push('functional: skipped, no endpoint probe');
    }

    if (this.testSuite) {
      try {
        const suite = await this.testSuite.run();
        detail.push(`suite: ${suite.passed ? 'passed' : 'failed'}`);
        if (!suite.passed) {
          const reasons = suite.failures.length > 0 ? suite.failures : ['failed'];
          failures.push(...reasons.map((f) => `suite:${f}`));
        }
      } catch (err) {
        failures.push(`suite:${errorMessage(err)}`);
      }
    } else {
      detail.push('suite: skipped, no test suite');
    }

    if (failures.length > 0) {
      await this.fail(
        run,
        'test',
        {
          kind: 'TestFailure',
          message: `${failures.length} check(s) failed; infrastructure was left in place.`,
          checks: failures
        },
        log
      );
      return false;
    }

    await this.finish(run, 'test', 'success');
    return true;
  }

  private async runCheck(check: () => Promise<CheckResult>): Promise<CheckResult> {
    try {
      return await check();
    } catch (err) {
      return { name: 'probe', passed: false, detail: errorMessage(err) };
    }
  }

  private async teardown(run: PipelineRun, graph: ResourceGraph, log: Logger): Promise<void> {
    await this.begin(run, 'teardown');
    const policy = this.policy(run);

    if (run.trigger === 'commit') {
      await this.fail(
        run,
        'teardown',
        { kind: 'TeardownNotAllowed', message: 'Teardown needs a manual or scheduled trigger.' },
        log
      );
      return;
    }
    if (!policy.teardownAllowed) {
      await this.fail(
        run,
        'teardown',
        {
          kind: 'TeardownNotAllowed',
          message: `Teardown is not allowed in environment "${run.environment}".`
        },
        log
      );
      return;
    }

    let release: () => void;
    try {
      release = await this.locks.acquire(run.environment, run.id);
    } catch (err) {
      await this.fail(run, 'teardown', failureFrom(err), log);
      return;
    }

    try {
      let result: DestroyResult;
      try {
        result = await this.executorFor(run.environment).destroy(graph);
      } catch (err) {
        await this.fail(run, 'teardown', failureFrom(err), log);
        return;
      }
      run.outputs = appliedOutputs(result.state, graph);
      if (!result.ok) {
        const failure = failureFrom(result.error);
        await this.fail(
          run,
          'teardown',
          {
            ...failure,
            unit: result.failedUnit,
            message:
              `${failure.message} (${result.destroyed.length} unit(s) destroyed; ` +
              `${Object.keys(run.outputs).length} still applied)`
          },
          log
        );
        return;
      }
      run.stages.teardown.detail.push(`destroyed: ${result.destroyed.join(', ') || 'nothing'}`);
    } finally {
      release();
    }

    run.status = 'destroyed';
    await this.finish(run, 'teardown', 'success');
    log.info('Environment destroyed');
  }

  private async begin(run: PipelineRun, stage: Stage): Promise<void> {
    run.stages[stage].startedAt = now();
    await this.persist(run);
  }

  private async finish(
    run: PipelineRun,
    stage: Stage,
    outcome: StageOutcome,
    detail?: string
  ): Promise<void> {
    const record = run.stages[stage];
    record.outcome = outcome;
    record.finishedAt = now();
    if (detail) record.detail.push(detail);
    await this.persist(run);
  }

  private async skip(run: PipelineRun, stages: Stage[], reason: string): Promise<void> {
    for (const stage of stages) {
      const record = run.stages[stage];
      if (record.outcome === 'pending') {
        record.outcome = 'skipped';
        record.detail.push(reason);
      }
    }
    await this.persist(run);
  }

  private async fail(
    run: PipelineRun,
    stage: Stage,
    failure: Omit<RunFailure, 'stage'>,
    log: Logger
  ): Promise<void> {
    run.status = 'failed';
    run.failure = { stage, ...failure };
    const record = run.stages[stage];
    record.outcome = 'failed';
    record.finishedAt = now();
    record.detail.push(failure.message);
    await this.skip(
      run,
      STAGES.filter((s) => run.stages[s].outcome === 'pending'),
      `${stage} failed`
    );
    log.error({ failure: run.failure }, 'Pipeline run failed');
  }

  private async persist(run: PipelineRun): Promise<void> {
    run.updatedAt = now();
    await this.store.saveRun(run);
  }
}
