import type { FailureKind, RunFailure } from '../types/index.js';

/**
 * Base class for every failure the tool reports to the user
 */
export class StacksError extends Error {
  readonly code: FailureKind;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: FailureKind,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'StacksError';
    this.code = code;
    this.details = details;
  }
}

export class UnknownStackError extends StacksError {
  readonly stackName: string;
  readonly referencedBy: string | null;

  constructor(stackName: string, referencedBy: string | null = null) {
    super(
      referencedBy
        ? `invalid dependency: "${stackName}" is not a known stack (required by "${referencedBy}")`
        : `unknown stack "${stackName}"`,
      'unknown-stack',
      { stackName, referencedBy }
    );
    this.name = 'UnknownStackError';
    this.stackName = stackName;
    this.referencedBy = referencedBy;
  }
}

export class CycleError extends StacksError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`dependency cycle detected: ${cycle.join(' -> ')}`, 'cycle', {
      cycle,
    });
    this.name = 'CycleError';
    this.cycle = cycle;
  }
}

export class InvalidArgumentsError extends StacksError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'invalid-arguments', details);
    this.name = 'InvalidArgumentsError';
  }
}

export class ConfigError extends StacksError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'config', details);
    this.name = 'ConfigError';
  }
}

export class StackOperationError extends StacksError {
  readonly stackName: string;
  readonly step: string;
  readonly exitCode: number | null;
  readonly signal: string | null;
  readonly interrupted: boolean;

  constructor({
    stackName,
    step,
    reason,
    exitCode = null,
    signal = null,
    interrupted = false,
  }: {
    stackName: string;
    step: string;
    reason: string;
    exitCode?: number | null;
    signal?: string | null;
    interrupted?: boolean;
  }) {
    super(`stack "${stackName}" failed during "${step}": ${reason}`, 'stack-operation', {
      stackName,
      step,
      exitCode,
      signal,
      interrupted,
    });
    this.name = 'StackOperationError';
    this.stackName = stackName;
    this.step = step;
    this.exitCode = exitCode;
    this.signal = signal;
    this.interrupted = interrupted;
  }
}

/**
 * Convert a thrown tool error into the failure shape returned to callers
 */
export const toRunFailure = (error: StacksError): RunFailure => {
  const failure: RunFailure = { kind: error.code, message: error.message };

  if (error instanceof StackOperationError) {
    failure.stackName = error.stackName;
    failure.step = error.step;
  } else if (error instanceof UnknownStackError) {
    failure.stackName = error.stackName;
  }

  return failure;
};

export const getErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
