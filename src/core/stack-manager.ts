import type {
  CommandPlan,
  Executor,
  RunResult,
  StackGraph,
  StepResult,
  ToolCommand,
} from '../types/index.js';
import { translateCommand } from './command-translator.js';
import { orderStacks, resolveStacks } from './dependency-graph.js';
import { executePlan, type ExecutionCallbacks } from './executor.js';
import { InvalidArgumentsError, StacksError, toRunFailure } from './errors.js';
import { logger } from '../utils/logger.js';

/**
 * Translate, resolve and order a command. Every validation error surfaces
 * here, before anything is executed.
 */
export const planCommand = ({
  graph,
  command,
  stackNames,
  args,
}: {
  graph: StackGraph;
  command: string;
  stackNames: readonly string[];
  args: readonly string[];
}): CommandPlan => {
  const translation = translateCommand({ command, args });
  const withDependencies = translation.scope === 'dependencies';
  const stackKeys = resolveStacks({ graph, stackNames, withDependencies });

  if (translation.scope === 'single' && stackKeys.size !== 1) {
    throw new InvalidArgumentsError(
      `Command ${command} can only operate on one stack but ${stackKeys.size} were provided.`,
      { command, stackCount: stackKeys.size }
    );
  }

  const phases = translation.phases.map((phase) => ({
    direction: phase.direction,
    stackKeys: orderStacks({ graph, stackKeys, direction: phase.direction }),
    templates: phase.templates,
  }));

  phases.forEach((phase, index) => {
    logger.trace(
      `Phase ${index + 1} of \`${command}\` (${phase.direction}): ${phase.stackKeys.join(', ')}`
    );
  });

  return { command, requestedStacks: [...stackNames], phases };
};

/**
 * Run each phase of a plan in turn. The first failing step aborts the
 * remaining stacks and phases. Step results are reported through
 * onStepComplete, including the failing one.
 */
export const executeCommandPlan = async ({
  graph,
  tool,
  commandPlan,
  executor,
  callbacks,
  signal,
}: {
  graph: StackGraph;
  tool: ToolCommand;
  commandPlan: CommandPlan;
  executor: Executor;
  callbacks?: ExecutionCallbacks;
  signal?: AbortSignal;
}): Promise<void> => {
  for (const phase of commandPlan.phases) {
    await executePlan({
      graph,
      tool,
      plan: { direction: phase.direction, stackKeys: phase.stackKeys },
      templates: phase.templates,
      executor,
      callbacks,
      signal,
    });
  }
};

/**
 * Entry point for callers: plan a command against the requested stacks and
 * run it, reporting success or the failing stack, step and failure kind
 */
export const runStacks = async ({
  graph,
  tool,
  command,
  stackNames,
  args,
  executor,
  callbacks,
  signal,
  dryRun = false,
}: {
  graph: StackGraph;
  tool: ToolCommand;
  command: string;
  stackNames: readonly string[];
  args: readonly string[];
  executor: Executor;
  callbacks?: ExecutionCallbacks;
  signal?: AbortSignal;
  dryRun?: boolean;
}): Promise<RunResult> => {
  let plan: CommandPlan | null = null;
  const steps: StepResult[] = [];

  logger.trace(
    `Executing command \`${command}\` against ${stackNames.length > 0 ? `\`${stackNames.join(',')}\`` : 'all'} with arguments ${JSON.stringify(args)}`
  );

  try {
    plan = planCommand({ graph, command, stackNames, args });

    if (dryRun) {
      return { success: true, plan, steps };
    }

    await executeCommandPlan({
      graph,
      tool,
      commandPlan: plan,
      executor,
      signal,
      callbacks: {
        ...callbacks,
        onStepComplete: (invocation, outcome) => {
          steps.push({ stackKey: invocation.stackKey, step: invocation.step, outcome });
          callbacks?.onStepComplete?.(invocation, outcome);
        },
      },
    });

    return { success: true, plan, steps };
  } catch (error) {
    if (error instanceof StacksError) {
      return { success: false, plan, steps, failure: toRunFailure(error) };
    }
    throw error;
  }
};
