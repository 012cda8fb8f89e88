import type { CommandPlan } from './plan.js';

export interface Invocation {
  stackKey: string;
  step: string;
  program: string;
  args: string[];
  cwd: string;
  env: Record<string, string>;
}

export interface InvocationOutcome {
  success: boolean;
  exitCode: number | null;
  signal: string | null;
  output: string;
  errorMessage: string | null;
  durationMs: number;
}

export interface ExecutorOptions {
  signal?: AbortSignal;
  onOutput?: (data: string) => void;
}

export type Executor = (
  invocation: Invocation,
  options?: ExecutorOptions
) => Promise<InvocationOutcome>;

export interface StepResult {
  stackKey: string;
  step: string;
  outcome: InvocationOutcome;
}

export type FailureKind =
  | 'unknown-stack'
  | 'cycle'
  | 'invalid-arguments'
  | 'stack-operation'
  | 'config';

export interface RunFailure {
  kind: FailureKind;
  message: string;
  stackName?: string;
  step?: string;
}

export type RunResult =
  | {
      success: true;
      plan: CommandPlan;
      steps: StepResult[];
    }
  | {
      success: false;
      plan: CommandPlan | null;
      steps: StepResult[];
      failure: RunFailure;
    };
