// src/provisioning/state.ts
import { ErrorDetails } from '../errors';
import { ResourceKind, UnitOutputs } from '../compiler/ir';

export const UNIT_STATUSES = [
  'absent',
  'planned',
  'applying',
  'applied',
  'failed',
  'destroying',
  'destroyed'
] as const;

export type UnitStatus = (typeof UNIT_STATUSES)[number];

export interface UnitState {
  name: string;
  kind: ResourceKind;
  status: UnitStatus;
  outputs: UnitOutputs;
  /** Hash of the declaration as of the last successful apply. */
  appliedHash?: string;
  /** Hash of the resolved params and dependency outputs it was applied with. */
  appliedInputs?: string;
  lastError?: ErrorDetails;
  updatedAt: string;
}

/**
 * Everything the executor knows about one environment. `units` keeps
 * insertion order, which is the order units were first declared or applied.
 */
export interface ProvisionedState {
  environment: string;
  units: Record<string, UnitState>;
  updatedAt: string;
}

export const PLAN_ACTIONS = ['create', 'update', 'delete', 'noop'] as const;
export type PlanAction = (typeof PLAN_ACTIONS)[number];

export interface PlannedChange {
  unit: string;
  kind: ResourceKind;
  action: PlanAction;
  reason: string;
}

export interface PlanSummary {
  create: number;
  update: number;
  delete: number;
  unchanged: number;
}

export interface PlanArtifact {
  id: string;
  environment: string;
  createdAt: string;
  changes: PlannedChange[];
  summary: PlanSummary;
}

export function emptyState(environment: string): ProvisionedState {
  return { environment, units: {}, updatedAt: new Date().toISOString() };
}

/** True when the provider may still hold a resource for this unit. */
export function holdsResource(unit: UnitState): boolean {
  if (unit.status === 'applied') return true;
  if (unit.status === 'failed' || unit.status === 'applying' || unit.status === 'destroying') {
    return Object.keys(unit.outputs).length > 0 || unit.appliedHash !== undefined;
  }
  return false;
}

export function pendingChanges(plan: PlanArtifact): PlannedChange[] {
  return plan.changes.filter((c) => c.action !== 'noop');
}
