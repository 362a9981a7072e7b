// src/collaborators.ts
import { ResourceKind, UnitOutputs, UnitParams } from './compiler/ir';

export interface CreateRequest {
  name: string;
  kind: ResourceKind;
  params: UnitParams;
  /** Outputs of every direct dependency, keyed by dependency name. */
  dependencyOutputs: Record<string, UnitOutputs>;
}

export interface DestroyRequest {
  name: string;
  kind: ResourceKind;
  outputs: UnitOutputs;
}

export type ResourceHealth = 'healthy' | 'degraded' | 'missing';

/**
 * Applies and removes cloud resources. Implementations throw
 * ProviderTransientError for retryable failures and ProviderPermanentError
 * when the parameters are rejected.
 */
export interface ResourceProvider {
  create(request: CreateRequest): Promise<UnitOutputs>;
  destroy(request: DestroyRequest): Promise<void>;
  describe(kind: ResourceKind, name: string): Promise<ResourceHealth>;
}

export interface TrainingResult {
  artifact: Buffer;
  metrics: Record<string, number>;
}

export interface ModelTrainer {
  train(): Promise<TrainingResult>;
  /** Uploads the artifact into the object store and returns its URI. */
  publish(artifact: Buffer, storeOutputs: UnitOutputs): Promise<string>;
}

export interface EndpointDeployer {
  deploy(codePackage: string, endpointOutputs: UnitOutputs): Promise<void>;
}

export interface CheckResult {
  name: string;
  passed: boolean;
  detail?: string;
}

export interface EndpointProbe {
  checkHealth(endpointOutputs: UnitOutputs): Promise<CheckResult>;
  checkPrediction(
    endpointOutputs: UnitOutputs,
    features: number[]
  ): Promise<CheckResult>;
}

export interface TestSuiteResult {
  passed: boolean;
  failures: string[];
}

export interface TestSuite {
  run(): Promise<TestSuiteResult>;
}
