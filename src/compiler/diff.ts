// src/compiler/diff.ts
import { configHash } from './graph';
import { InvariantViolation } from './invariants';
import { ResourceUnit } from './ir';

export type RiskImpact = 'risk_increase' | 'risk_decrease' | 'neutral';
export type DeclarationChange = 'added' | 'removed' | 'modified' | 'unchanged';

export interface UnitChange {
  unitName: string;
  change: DeclarationChange;
  messages: string[];
  riskImpact: RiskImpact;
}

export interface DiffSummary {
  added: number;
  removed: number;
  modified: number;
  totalNewViolations: number;
  totalResolvedViolations: number;
}

export interface DiffResult {
  summary: DiffSummary;
  changes: UnitChange[];
}

function indexByUnit(
  violations: InvariantViolation[]
): Map<string, InvariantViolation[]> {
  const map = new Map<string, InvariantViolation[]>();
  for (const v of violations) {
    const arr = map.get(v.unitName) ?? [];
    arr.push(v);
    map.set(v.unitName, arr);
  }
  return map;
}

function describeModification(oldUnit: ResourceUnit, newUnit: ResourceUnit): string[] {
  const messages: string[] = [];
  if (oldUnit.kind !== newUnit.kind) {
    messages.push(`Kind changed from ${oldUnit.kind} to ${newUnit.kind}.`);
  }

  const keys = new Set([
    ...Object.keys(oldUnit.params),
    ...Object.keys(newUnit.params)
  ]);
  const changedKeys = [...keys]
    .filter(
      (k) =>
        JSON.stringify(oldUnit.params[k]) !== JSON.stringify(newUnit.params[k])
    )
    .sort();
  if (changedKeys.length > 0) {
    messages.push(`Parameters changed: ${changedKeys.join(', ')}.`);
  }

  const oldDeps = [...oldUnit.dependsOn].sort().join(', ');
  const newDeps = [...newUnit.dependsOn].sort().join(', ');
  if (oldDeps !== newDeps) {
    messages.push(`Dependencies changed from [${oldDeps}] to [${newDeps}].`);
  }
  return messages;
}

/**
 * Compares two stack declarations unit by unit. Violation counts are carried
 * along so a reviewer can see whether a change makes the stack riskier.
 */
export function diffStacks(
  oldUnits: ResourceUnit[],
  newUnits: ResourceUnit[],
  oldViolations: InvariantViolation[],
  newViolations: InvariantViolation[]
): DiffResult {
  const oldIndex = indexByUnit(oldViolations);
  const newIndex = indexByUnit(newViolations);
  const oldByName = new Map(oldUnits.map((u) => [u.name, u]));
  const newByName = new Map(newUnits.map((u) => [u.name, u]));

  const summary: DiffSummary = {
    added: 0,
    removed: 0,
    modified: 0,
    totalNewViolations: 0,
    totalResolvedViolations: 0
  };

  const changes: UnitChange[] = [];

  const allUnitNames = new Set<string>([
    ...oldUnits.map((u) => u.name),
    ...newUnits.map((u) => u.name)
  ]);

  for (const name of allUnitNames) {
    const oldUnit = oldByName.get(name);
    const newUnit = newByName.get(name);
    const messages: string[] = [];
    let change: DeclarationChange = 'unchanged';

    if (!oldUnit && newUnit) {
      change = 'added';
      summary.added++;
      messages.push(`New ${newUnit.kind} unit.`);
    } else if (oldUnit && !newUnit) {
      change = 'removed';
      summary.removed++;
      messages.push(`${oldUnit.kind} unit removed; it will be destroyed.`);
    } else if (oldUnit && newUnit && configHash(oldUnit) !== configHash(newUnit)) {
      change = 'modified';
      summary.modified++;
      messages.push(...describeModification(oldUnit, newUnit));
    }

    const oldCount = (oldIndex.get(name) ?? []).length;
    const newVs = newIndex.get(name) ?? [];
    const newCount = newVs.length;

    if (newCount > oldCount) {
      summary.totalNewViolations += newCount - oldCount;
      messages.push(`Violations increased from ${oldCount} to ${newCount}.`);
    } else if (newCount < oldCount) {
      summary.totalResolvedViolations += oldCount - newCount;
      messages.push(`Violations decreased from ${oldCount} to ${newCount}.`);
    }

    if (change === 'unchanged' && newCount === oldCount) {
      continue;
    }

    if (newVs.length > 0) {
      messages.push(
        'Current violations: ' +
          newVs.map((v) => `${v.id} (${v.severity})`).join(', ')
      );
    }

    let riskImpact: RiskImpact = 'neutral';
    if (newCount > oldCount) riskImpact = 'risk_increase';
    else if (newCount < oldCount) riskImpact = 'risk_decrease';

    changes.push({
      unitName: name,
      change,
      messages,
      riskImpact
    });
  }

  return { summary, changes };
}
