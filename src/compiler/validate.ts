// src/compiler/validate.ts
import { ConfigurationError, StackError } from '../errors';
import { buildResourceGraph, ResourceGraph } from './graph';
import { checkInvariants, hasBlockingViolations, InvariantViolation } from './invariants';
import { ResourceKind, ResourceUnit, StackIR } from './ir';
import { findReferences } from './references';

export interface DeployTargets {
  artifactStore: ResourceUnit;
  endpoint: ResourceUnit;
}

export interface StackValidation {
  graph?: ResourceGraph;
  targets?: DeployTargets;
  violations: InvariantViolation[];
  error?: StackError;
}

function pickTarget(
  graph: ResourceGraph,
  requested: string | undefined,
  kind: ResourceKind,
  role: string
): ResourceUnit {
  if (requested !== undefined) {
    const unit = graph.get(requested);
    if (!unit) {
      throw new ConfigurationError(`${role} "${requested}" is not a declared unit.`);
    }
    if (unit.kind !== kind) {
      throw new ConfigurationError(
        `${role} "${requested}" must be a ${kind}, not a ${unit.kind}.`,
        'InvalidConfiguration',
        requested
      );
    }
    return unit;
  }

  const unit = graph.order.find((u) => u.kind === kind);
  if (!unit) {
    throw new ConfigurationError(`Stack declares no ${kind} to use as ${role}.`);
  }
  return unit;
}

export function resolveDeployTargets(stack: StackIR, graph: ResourceGraph): DeployTargets {
  return {
    artifactStore: pickTarget(graph, stack.deploy.artifactStore, 'object-store', 'artifact store'),
    endpoint: pickTarget(graph, stack.deploy.endpoint, 'compute-endpoint', 'endpoint')
  };
}

function checkReferences(graph: ResourceGraph): void {
  for (const unit of graph.order) {
    for (const ref of findReferences(unit.params)) {
      if (!unit.dependsOn.includes(ref.unit)) {
        throw new ConfigurationError(
          `Unit "${unit.name}" references "${ref.unit}.${ref.key}" but does not depend on "${ref.unit}".`,
          'InvalidConfiguration',
          unit.name
        );
      }
    }
  }
}

/**
 * Everything that can be checked without talking to a provider: graph
 * shape, output references, lint rules and deploy targets.
 */
export function validateStack(stack: StackIR): StackValidation {
  let graph: ResourceGraph;
  try {
    graph = buildResourceGraph(stack.units);
    checkReferences(graph);
  } catch (err) {
    if (err instanceof StackError) return { violations: [], error: err };
    throw err;
  }

  const violations = checkInvariants(graph);
  if (hasBlockingViolations(violations)) {
    const blocking = violations.filter((v) => v.severity === 'high');
    return {
      graph,
      violations,
      error: new ConfigurationError(
        `${blocking.length} blocking violation(s): ` +
          blocking.map((v) => `${v.id} @ ${v.unitName}`).join(', '),
        'InvalidConfiguration',
        blocking[0].unitName
      )
    };
  }

  try {
    const targets = resolveDeployTargets(stack, graph);
    return { graph, targets, violations };
  } catch (err) {
    if (err instanceof StackError) return { graph, violations, error: err };
    throw err;
  }
}
