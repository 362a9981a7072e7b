// src/compiler/invariants.ts
import { ResourceGraph } from './graph';
import { ResourceKind, ResourceUnit } from './ir';

export type Severity = 'low' | 'medium' | 'high';

export interface InvariantViolation {
  id: string;
  description: string;
  unitName: string;
  severity: Severity;
}

type Rule = (unit: ResourceUnit, graph: ResourceGraph) => InvariantViolation | null;

function dependsOnKind(
  graph: ResourceGraph,
  unit: ResourceUnit,
  kind: ResourceKind
): boolean {
  return graph.transitiveDependenciesOf(unit.name).some((d) => d.kind === kind);
}

// R1: model store must not allow anonymous access
function ruleNoPublicStore(unit: ResourceUnit): InvariantViolation | null {
  if (unit.kind !== 'object-store') return null;
  if (unit.params.publicAccess !== true) return null;

  return {
    id: 'R1_NO_PUBLIC_STORE',
    description:
      'Object store allows public access. Model artifacts must only be readable by the endpoint.',
    unitName: unit.name,
    severity: 'high'
  };
}

// R2: endpoints read credentials from a secret store, never from params
function ruleEndpointRequiresSecrets(
  unit: ResourceUnit,
  graph: ResourceGraph
): InvariantViolation | null {
  if (unit.kind !== 'compute-endpoint') return null;
  if (dependsOnKind(graph, unit, 'secret-store')) return null;

  return {
    id: 'R2_ENDPOINT_REQUIRES_SECRETS',
    description:
      'Compute endpoint does not depend on a secret store. Storage credentials must be injected from a secret store.',
    unitName: unit.name,
    severity: 'high'
  };
}

// R3: endpoints should report to a telemetry sink
function ruleEndpointRequiresTelemetry(
  unit: ResourceUnit,
  graph: ResourceGraph
): InvariantViolation | null {
  if (unit.kind !== 'compute-endpoint') return null;
  if (dependsOnKind(graph, unit, 'telemetry-sink')) return null;

  return {
    id: 'R3_ENDPOINT_REQUIRES_TELEMETRY',
    description:
      'Compute endpoint does not depend on a telemetry sink. Requests and failures will not be traced.',
    unitName: unit.name,
    severity: 'low'
  };
}

// R4: secret stores should not accept traffic from the public internet
function ruleSecretsPublicNetwork(unit: ResourceUnit): InvariantViolation | null {
  if (unit.kind !== 'secret-store') return null;
  if (unit.params.publicNetworkAccess !== true) return null;

  return {
    id: 'R4_SECRETS_PUBLIC_NETWORK',
    description:
      'Secret store accepts connections from public networks. Restrict it to the network boundary.',
    unitName: unit.name,
    severity: 'medium'
  };
}

const RULES: Rule[] = [
  ruleNoPublicStore,
  ruleEndpointRequiresSecrets,
  ruleEndpointRequiresTelemetry,
  ruleSecretsPublicNetwork
];

export function checkInvariants(graph: ResourceGraph): InvariantViolation[] {
  const violations: InvariantViolation[] = [];

  for (const unit of graph.order) {
    for (const rule of RULES) {
      const v = rule(unit, graph);
      if (v) violations.push(v);
    }
  }

  return violations;
}

export function hasBlockingViolations(violations: InvariantViolation[]): boolean {
  return violations.some((v) => v.severity === 'high');
}
