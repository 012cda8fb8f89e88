import { createStackGraph } from '../src/core/stack-graph.js';
import type {
  Executor,
  Invocation,
  InvocationOutcome,
  StackGraph,
  ToolCommand,
} from '../src/types/index.js';

export const BASE_DIR = '/srv/stacks';

export const DOCKER_COMPOSE: ToolCommand = { program: 'docker', args: ['compose'] };

/**
 * Build a graph from a key -> dependencies record
 */
export const graphOf = (dependencies: Record<string, string[]>): StackGraph =>
  createStackGraph({
    baseDir: BASE_DIR,
    stacks: Object.entries(dependencies).map(([key, dependsOn]) => ({
      key,
      dependsOn,
    })),
  });

export const NETWORKS_GRAPH = {
  networks: [],
  web: ['networks'],
  worker: ['networks'],
};

export const outcome = (
  success: boolean,
  overrides: Partial<InvocationOutcome> = {}
): InvocationOutcome => ({
  success,
  exitCode: success ? 0 : 1,
  signal: null,
  output: '',
  errorMessage: success ? null : 'exit code 1',
  durationMs: 0,
  ...overrides,
});

/**
 * In-process stand-in for the compose tool. Records every invocation and
 * fails the ones matching failOn.
 */
export const createFakeExecutor = ({
  failOn,
}: {
  failOn?: (invocation: Invocation) => boolean;
} = {}): { executor: Executor; calls: Invocation[] } => {
  const calls: Invocation[] = [];

  const executor: Executor = async (invocation) => {
    calls.push(invocation);
    return outcome(!(failOn?.(invocation) ?? false));
  };

  return { executor, calls };
};

export const callLabels = (calls: Invocation[]): string[] =>
  calls.map((call) => `${call.stackKey}:${call.step}`);
