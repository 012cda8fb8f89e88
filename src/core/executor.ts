import type {
  ExecutionPlan,
  Executor,
  Invocation,
  InvocationOutcome,
  InvocationTemplate,
  Stack,
  StackGraph,
  StepResult,
  ToolCommand,
} from '../types/index.js';
import { StackOperationError } from './errors.js';
import { getStack } from './stack-graph.js';
import { logger } from '../utils/logger.js';

export interface ExecutionCallbacks {
  onStackStart?: (stackKey: string) => void;
  onStepStart?: (invocation: Invocation) => void;
  onStepComplete?: (invocation: Invocation, outcome: InvocationOutcome) => void;
  onStackComplete?: (stackKey: string, durationMs: number) => void;
  onOutput?: (stackKey: string, data: string) => void;
}

/**
 * Parameterize a template for one stack: project name, compose files,
 * working directory and environment overlay
 */
export const createInvocation = ({
  tool,
  stack,
  template,
}: {
  tool: ToolCommand;
  stack: Stack;
  template: InvocationTemplate;
}): Invocation => ({
  stackKey: stack.key,
  step: template.step,
  program: tool.program,
  args: [
    ...tool.args,
    '-p',
    stack.name,
    ...stack.files.flatMap((file) => ['-f', file]),
    template.subcommand,
    ...template.args,
  ],
  cwd: stack.directory,
  env: { ...stack.environment },
});

export const formatInvocation = (invocation: Invocation): string =>
  [invocation.program, ...invocation.args].join(' ');

const interruptedError = (invocation: Invocation): StackOperationError =>
  new StackOperationError({
    stackName: invocation.stackKey,
    step: invocation.step,
    reason: 'interrupted',
    interrupted: true,
  });

/**
 * Run every template against every stack of the plan, one invocation at a
 * time. Stops at the first failing step and throws a StackOperationError;
 * stacks already processed are left as they are.
 */
export const executePlan = async ({
  graph,
  tool,
  plan,
  templates,
  executor,
  callbacks,
  signal,
}: {
  graph: StackGraph;
  tool: ToolCommand;
  plan: ExecutionPlan;
  templates: InvocationTemplate[];
  executor: Executor;
  callbacks?: ExecutionCallbacks;
  signal?: AbortSignal;
}): Promise<StepResult[]> => {
  const results: StepResult[] = [];

  logger.trace(
    `Executing ${templates.map((t) => t.step).join(', ')} in ${plan.direction} order against ${plan.stackKeys.join(',')}`
  );

  for (const stackKey of plan.stackKeys) {
    const stack = getStack({ graph, stackKey });
    const startTime = Date.now();
    callbacks?.onStackStart?.(stackKey);

    for (const template of templates) {
      const invocation = createInvocation({ tool, stack, template });

      if (signal?.aborted) {
        throw interruptedError(invocation);
      }

      logger.debug(`Executing \`${formatInvocation(invocation)}\` in ${invocation.cwd}`);
      callbacks?.onStepStart?.(invocation);

      const outcome = await executor(invocation, {
        signal,
        onOutput: (data) => callbacks?.onOutput?.(stackKey, data),
      });

      callbacks?.onStepComplete?.(invocation, outcome);
      results.push({ stackKey, step: invocation.step, outcome });

      if (signal?.aborted) {
        throw interruptedError(invocation);
      }

      if (!outcome.success) {
        throw new StackOperationError({
          stackName: stackKey,
          step: invocation.step,
          reason:
            outcome.errorMessage ??
            `Error running command \`${formatInvocation(invocation)}\``,
          exitCode: outcome.exitCode,
          signal: outcome.signal,
        });
      }
    }

    callbacks?.onStackComplete?.(stackKey, Date.now() - startTime);
  }

  return results;
};
