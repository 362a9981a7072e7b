// Shared stand-ins for provider, trainer, deployer, probe and suite.
import pino from 'pino';
import {
  CheckResult,
  CreateRequest,
  DestroyRequest,
  EndpointDeployer,
  EndpointProbe,
  ModelTrainer,
  ResourceHealth,
  ResourceProvider,
  TestSuite,
  TestSuiteResult,
  TrainingResult
} from '../collaborators';
import { ResourceKind, ResourceUnit, StackIR, UnitOutputs, UnitParams } from '../compiler/ir';
import { Logger } from '../logger';

export const silentLogger: Logger = pino({ level: 'silent' });

export function unit(
  name: string,
  kind: ResourceKind,
  dependsOn: string[] = [],
  params: UnitParams = {}
): ResourceUnit {
  return { name, kind, params, dependsOn };
}

/**
 * net, secrets, store, telemetry, endpoint; the endpoint reads the store's
 * connection string through an output reference.
 */
export function servingUnits(): ResourceUnit[] {
  return [
    unit('net', 'network-boundary'),
    unit('secrets', 'secret-store', ['net']),
    unit('store', 'object-store', ['net'], { container: 'models' }),
    unit('telemetry', 'telemetry-sink'),
    unit('endpoint', 'compute-endpoint', ['store', 'secrets', 'telemetry'], {
      storage: '${store.connectionString}'
    })
  ];
}

export function servingStack(overrides: Partial<StackIR> = {}): StackIR {
  return {
    name: 'ml-serving',
    units: servingUnits(),
    environments: {
      dev: { autoDeploy: true, requiresManualApproval: false, teardownAllowed: true },
      staging: { autoDeploy: false, requiresManualApproval: false, teardownAllowed: true },
      prod: { autoDeploy: false, requiresManualApproval: true, teardownAllowed: false }
    },
    branches: { develop: 'dev', main: 'prod' },
    model: { name: 'classifier', version: 'v1' },
    deploy: { codePackage: './function_app' },
    test: { predictFeatures: [0.5] },
    ...overrides
  };
}

type ProviderOp = 'create' | 'destroy';

export class FakeResourceProvider implements ResourceProvider {
  /** `create:<unit>` / `destroy:<unit>` in call order */
  readonly calls: string[] = [];
  readonly createRequests: CreateRequest[] = [];
  readonly live = new Map<string, ResourceKind>();
  private readonly failures = new Map<string, unknown>();
  private readonly health = new Map<string, ResourceHealth>();
  private readonly emitted = new Map<string, UnitOutputs>();

  /** Outputs merged into every later create of `name`. */
  emit(name: string, outputs: UnitOutputs): void {
    this.emitted.set(name, outputs);
  }

  failOn(op: ProviderOp, name: string, error: unknown): void {
    this.failures.set(`${op}:${name}`, error);
  }

  recover(op: ProviderOp, name: string): void {
    this.failures.delete(`${op}:${name}`);
  }

  reportHealth(name: string, health: ResourceHealth): void {
    this.health.set(name, health);
  }

  creates(): string[] {
    return this.calls.filter((c) => c.startsWith('create:')).map((c) => c.slice(7));
  }

  destroys(): string[] {
    return this.calls.filter((c) => c.startsWith('destroy:')).map((c) => c.slice(8));
  }

  async create(request: CreateRequest): Promise<UnitOutputs> {
    this.calls.push(`create:${request.name}`);
    this.createRequests.push(request);
    const failure = this.failures.get(`create:${request.name}`);
    if (failure !== undefined) throw failure;

    this.live.set(request.name, request.kind);
    const outputs: UnitOutputs = { id: `fake/${request.name}` };
    if (request.kind === 'object-store') outputs.connectionString = `conn-${request.name}`;
    if (request.kind === 'compute-endpoint') outputs.url = `http://${request.name}.test`;
    return { ...outputs, ...this.emitted.get(request.name) };
  }

  async destroy(request: DestroyRequest): Promise<void> {
    this.calls.push(`destroy:${request.name}`);
    const failure = this.failures.get(`destroy:${request.name}`);
    if (failure !== undefined) throw failure;
    this.live.delete(request.name);
  }

  async describe(kind: ResourceKind, name: string): Promise<ResourceHealth> {
    const reported = this.health.get(name);
    if (reported) return reported;
    const liveKind = this.live.get(name);
    if (!liveKind) return 'missing';
    return liveKind === kind ? 'healthy' : 'degraded';
  }
}

export class FakeTrainer implements ModelTrainer {
  trained = 0;
  readonly published: UnitOutputs[] = [];
  failTraining?: Error;

  async train(): Promise<TrainingResult> {
    this.trained++;
    if (this.failTraining) throw this.failTraining;
    return { artifact: Buffer.from('weights'), metrics: { accuracy: 0.9 } };
  }

  async publish(_artifact: Buffer, storeOutputs: UnitOutputs): Promise<string> {
    this.published.push(storeOutputs);
    return `memory://${storeOutputs.id}/classifier_v1.bin`;
  }
}

export class FakeDeployer implements EndpointDeployer {
  readonly deployments: Array<{ codePackage: string; endpointOutputs: UnitOutputs }> = [];

  async deploy(codePackage: string, endpointOutputs: UnitOutputs): Promise<void> {
    this.deployments.push({ codePackage, endpointOutputs });
  }
}

export class FakeProbe implements EndpointProbe {
  healthy = true;
  predicts = true;

  async checkHealth(): Promise<CheckResult> {
    return this.healthy
      ? { name: 'health', passed: true }
      : { name: 'health', passed: false, detail: 'HTTP 503' };
  }

  async checkPrediction(): Promise<CheckResult> {
    return this.predicts
      ? { name: 'predict', passed: true, detail: 'prediction=1' }
      : { name: 'predict', passed: false, detail: 'HTTP 500' };
  }
}

export class FakeSuite implements TestSuite {
  constructor(private readonly result: TestSuiteResult = { passed: true, failures: [] }) {}

  async run(): Promise<TestSuiteResult> {
    return this.result;
  }
}
