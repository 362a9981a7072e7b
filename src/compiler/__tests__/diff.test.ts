import { describe, it, expect } from 'vitest';
import { diffStacks } from '../diff';
import { InvariantViolation } from '../invariants';
import { unit } from '../../__tests__/fakes';

const publicStore: InvariantViolation = {
  id: 'R1_NO_PUBLIC_STORE',
  description: 'public',
  unitName: 'store',
  severity: 'high'
};

describe('diffStacks', () => {
  it('should describe added, removed and modified units', () => {
    const oldUnits = [
      unit('store', 'object-store', [], { container: 'models' }),
      unit('old-sink', 'telemetry-sink')
    ];
    const newUnits = [
      unit('store', 'object-store', ['net'], { container: 'archive', publicAccess: true }),
      unit('net', 'network-boundary')
    ];

    const { summary, changes } = diffStacks(oldUnits, newUnits, [], [publicStore]);

    expect(summary).toEqual({
      added: 1,
      removed: 1,
      modified: 1,
      totalNewViolations: 1,
      totalResolvedViolations: 0
    });
    expect(changes).toEqual([
      {
        unitName: 'store',
        change: 'modified',
        messages: [
          'Parameters changed: container, publicAccess.',
          'Dependencies changed from [] to [net].',
          'Violations increased from 0 to 1.',
          'Current violations: R1_NO_PUBLIC_STORE (high)'
        ],
        riskImpact: 'risk_increase'
      },
      {
        unitName: 'old-sink',
        change: 'removed',
        messages: ['telemetry-sink unit removed; it will be destroyed.'],
        riskImpact: 'neutral'
      },
      {
        unitName: 'net',
        change: 'added',
        messages: ['New network-boundary unit.'],
        riskImpact: 'neutral'
      }
    ]);
  });

  it('should report a kind change', () => {
    const { changes } = diffStacks(
      [unit('sink', 'telemetry-sink')],
      [unit('sink', 'secret-store')],
      [],
      []
    );

    expect(changes[0].messages).toEqual(['Kind changed from telemetry-sink to secret-store.']);
  });

  it('should omit units whose declaration and violations are unchanged', () => {
    const units = [unit('store', 'object-store', [], { container: 'models' })];

    expect(diffStacks(units, units, [publicStore], [publicStore]).changes).toEqual([]);
  });

  it('should ignore reordered dependencies', () => {
    const { changes } = diffStacks(
      [unit('api', 'compute-endpoint', ['a', 'b'])],
      [unit('api', 'compute-endpoint', ['b', 'a'])],
      [],
      []
    );

    expect(changes).toEqual([]);
  });

  it('should report resolved violations on an otherwise unchanged unit', () => {
    const units = [unit('store', 'object-store')];

    const { summary, changes } = diffStacks(units, units, [publicStore], []);

    expect(summary.totalResolvedViolations).toBe(1);
    expect(changes).toEqual([
      {
        unitName: 'store',
        change: 'unchanged',
        messages: ['Violations decreased from 1 to 0.'],
        riskImpact: 'risk_decrease'
      }
    ]);
  });
});
