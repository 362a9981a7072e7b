// src/compiler/ir.ts

export const RESOURCE_KINDS = [
  'network-boundary',
  'object-store',
  'secret-store',
  'compute-endpoint',
  'telemetry-sink'
] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

export type ParamValue =
  | string
  | number
  | boolean
  | null
  | ParamValue[]
  | { [key: string]: ParamValue };

export type UnitParams = Record<string, ParamValue>;

/** Values a provider reports back for an applied unit (ids, URIs, keys). */
export type UnitOutputs = Record<string, string>;

export interface ResourceUnit {
  name: string;
  kind: ResourceKind;
  params: UnitParams;
  dependsOn: string[];
}

export interface EnvironmentPolicy {
  autoDeploy: boolean;
  requiresManualApproval: boolean;
  teardownAllowed: boolean;
  approvalTimeoutMs?: number;
}

export interface ModelSpec {
  name: string;
  version: string;
  /** Trained artifact picked up by the local trainer */
  artifactPath?: string;
  metricsPath?: string;
}

export interface DeploySettings {
  artifactStore?: string; // unit name, defaults to first object-store
  endpoint?: string; // unit name, defaults to first compute-endpoint
  codePackage: string;
}

export interface TestSettings {
  predictFeatures?: number[];
}

export interface StackIR {
  name: string;
  units: ResourceUnit[];
  environments: Record<string, EnvironmentPolicy>;
  branches: Record<string, string>;
  model: ModelSpec;
  deploy: DeploySettings;
  test: TestSettings;
  metadata?: {
    sourceFormat: 'yaml' | 'json';
    rawHash?: string; // small hash of raw config for reference
  };
}
