// src/errors.ts

export const ERROR_KINDS = [
  'UnknownDependency',
  'CyclicDependency',
  'DuplicateUnit',
  'InvalidConfiguration',
  'UnknownEnvironment',
  'ProviderUnavailable',
  'DependencyOutputMissing',
  'ApprovalRejected',
  'ApprovalTimeout',
  'TestFailure',
  'TeardownNotAllowed',
  'EnvironmentBusy',
  'InvalidRunState',
  'RunNotFound',
  'StepFailed'
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export interface ErrorDetails {
  kind: ErrorKind;
  message: string;
  unit?: string;
}

/**
 * Base error for everything the compiler, executor and orchestrator raise.
 * `kind` is what gets recorded on a PipelineRun.
 */
export class StackError extends Error {
  public readonly kind: ErrorKind;
  public readonly retryable: boolean;
  public readonly unit: string | undefined;

  constructor(
    message: string,
    kind: ErrorKind,
    options: { retryable?: boolean; unit?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'StackError';
    this.kind = kind;
    this.retryable = options.retryable ?? false;
    this.unit = options.unit;
  }

  toDetails(): ErrorDetails {
    const details: ErrorDetails = { kind: this.kind, message: this.message };
    if (this.unit !== undefined) details.unit = this.unit;
    return details;
  }
}

/**
 * Raised before any provider call: bad stack files, unknown or cyclic
 * dependencies, invalid runtime settings.
 */
export class ConfigurationError extends StackError {
  constructor(
    message: string,
    kind: ErrorKind = 'InvalidConfiguration',
    unit?: string
  ) {
    super(message, kind, { unit });
    this.name = 'ConfigurationError';
  }
}

export class UnknownDependencyError extends ConfigurationError {
  public readonly dependency: string;

  constructor(unit: string, dependency: string) {
    super(
      `Unit "${unit}" depends on "${dependency}", which is not declared.`,
      'UnknownDependency',
      unit
    );
    this.name = 'UnknownDependencyError';
    this.dependency = dependency;
  }
}

export class CyclicDependencyError extends ConfigurationError {
  public readonly cycle: string[];

  constructor(cycle: string[]) {
    super(
      `Dependency cycle: ${[...cycle, cycle[0]].join(' -> ')}`,
      'CyclicDependency',
      cycle[0]
    );
    this.name = 'CyclicDependencyError';
    this.cycle = cycle;
  }
}

export class DuplicateUnitError extends ConfigurationError {
  constructor(unit: string) {
    super(`Unit "${unit}" is declared more than once.`, 'DuplicateUnit', unit);
    this.name = 'DuplicateUnitError';
  }
}

export class UnknownEnvironmentError extends ConfigurationError {
  constructor(message: string) {
    super(message, 'UnknownEnvironment');
    this.name = 'UnknownEnvironmentError';
  }
}

/** Network or timeout failure talking to the provider; safe to retry. */
export class ProviderTransientError extends StackError {
  constructor(message: string, unit?: string, cause?: unknown) {
    super(message, 'ProviderUnavailable', { retryable: true, unit, cause });
    this.name = 'ProviderTransientError';
  }
}

/** The provider rejected the unit's parameters. */
export class ProviderPermanentError extends StackError {
  constructor(message: string, unit?: string, cause?: unknown) {
    super(message, 'InvalidConfiguration', { unit, cause });
    this.name = 'ProviderPermanentError';
  }
}

export class DependencyOutputMissingError extends StackError {
  public readonly dependency: string;

  constructor(unit: string, dependency: string, key?: string) {
    super(
      key === undefined
        ? `Unit "${unit}" needs outputs of "${dependency}", which is not applied.`
        : `Unit "${unit}" references "${dependency}.${key}", which "${dependency}" did not output.`,
      'DependencyOutputMissing',
      { unit }
    );
    this.name = 'DependencyOutputMissingError';
    this.dependency = dependency;
  }
}

export class EnvironmentBusyError extends StackError {
  constructor(environment: string, holder: string) {
    super(
      `Environment "${environment}" is locked by run ${holder}.`,
      'EnvironmentBusy',
      { retryable: true }
    );
    this.name = 'EnvironmentBusyError';
  }
}

export class InvalidRunStateError extends StackError {
  constructor(message: string) {
    super(message, 'InvalidRunState');
    this.name = 'InvalidRunStateError';
  }
}

export class RunNotFoundError extends StackError {
  constructor(runId: string) {
    super(`Pipeline run ${runId} not found.`, 'RunNotFound');
    this.name = 'RunNotFoundError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
