// src/compiler/references.ts
import { DependencyOutputMissingError } from '../errors';
import { ParamValue, UnitOutputs, UnitParams } from './ir';

// ${store.connectionString}
const REFERENCE = /\$\{([a-z][a-z0-9-]*)\.([A-Za-z0-9_]+)\}/g;

export interface OutputReference {
  unit: string;
  key: string;
}

function collect(value: ParamValue, into: OutputReference[]): void {
  if (typeof value === 'string') {
    for (const match of value.matchAll(REFERENCE)) {
      into.push({ unit: match[1], key: match[2] });
    }
  } else if (Array.isArray(value)) {
    value.forEach((v) => collect(v, into));
  } else if (value !== null && typeof value === 'object') {
    Object.values(value).forEach((v) => collect(v, into));
  }
}

export function findReferences(params: UnitParams): OutputReference[] {
  const refs: OutputReference[] = [];
  collect(params, refs);
  return refs;
}

function substitute(
  value: ParamValue,
  unitName: string,
  outputs: Record<string, UnitOutputs>
): ParamValue {
  if (typeof value === 'string') {
    return value.replace(REFERENCE, (_match, dep: string, key: string) => {
      const resolved = outputs[dep]?.[key];
      if (resolved === undefined) {
        throw new DependencyOutputMissingError(unitName, dep, key);
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) {
    return value.map((v) => substitute(v, unitName, outputs));
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, ParamValue> = {};
    for (const [k, v] of Object.entries(value)) {
      result[k] = substitute(v, unitName, outputs);
    }
    return result;
  }
  return value;
}

/**
 * Replaces every `${unit.key}` in string parameters with the named
 * dependency output.
 */
export function resolveParams(
  unitName: string,
  params: UnitParams,
  outputs: Record<string, UnitOutputs>
): UnitParams {
  const result: UnitParams = {};
  for (const [k, v] of Object.entries(params)) {
    result[k] = substitute(v, unitName, outputs);
  }
  return result;
}
