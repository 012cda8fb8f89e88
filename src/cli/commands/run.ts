import chalk from 'chalk';
import ora from 'ora';
import { loadStacksConfig } from '../../storage/index.js';
import { runStacks } from '../../core/stack-manager.js';
import { createProcessExecutor } from '../../core/process-executor.js';
import {
  createInvocation,
  formatInvocation,
  type ExecutionCallbacks,
} from '../../core/executor.js';
import { getStack } from '../../core/stack-graph.js';
import { StacksError } from '../../core/errors.js';
import { levelFromVerbosity, logger } from '../../utils/logger.js';
import { formatDuration } from '../../utils/format.js';
import type { CommandPlan, StacksConfig, StepResult } from '../../types/index.js';

export interface GlobalOptions {
  file?: string;
  stacks?: string[];
  dryRun?: boolean;
  quiet?: boolean;
  verbose?: number;
}

export interface CommandRequest {
  command: string;
  args: string[];
  globals: GlobalOptions;
}

/**
 * Load the stacks file and run a command across the requested stacks.
 * Resolves to the process exit code.
 */
export const runCommand = async ({
  command,
  args,
  globals,
}: CommandRequest): Promise<number> => {
  logger.setLevel(
    levelFromVerbosity({
      verbose: globals.verbose ?? 0,
      quiet: globals.quiet ?? false,
      defaultLevel: logger.getLevel(),
    })
  );

  let config: StacksConfig;
  try {
    config = await loadStacksConfig({ file: globals.file });
  } catch (error) {
    if (error instanceof StacksError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }

  const quiet = globals.quiet ?? false;
  const dryRun = globals.dryRun ?? false;
  const controller = new AbortController();

  const onInterrupt = (): void => {
    logger.warn('Interrupted, no further stacks will be processed.');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const result = await runStacks({
      graph: config.graph,
      tool: config.tool,
      command,
      stackNames: globals.stacks ?? [],
      args,
      executor: createProcessExecutor({ stdio: quiet ? 'pipe' : 'inherit' }),
      callbacks: createProgressCallbacks({ quiet }),
      signal: controller.signal,
      dryRun,
    });

    if (result.success && dryRun) {
      showDryRun({ config, plan: result.plan });
      return 0;
    }

    showSummary({ command, steps: result.steps });

    if (!result.success) {
      const failedStep = result.steps.find((step) => !step.outcome.success);
      if (quiet && failedStep?.outcome.output) {
        console.error(chalk.dim(failedStep.outcome.output.trimEnd()));
      }
      logger.error(result.failure.message);
      return 1;
    }

    return 0;
  } finally {
    process.off('SIGINT', onInterrupt);
  }
};

/**
 * Progress lines per step. In quiet mode the spinner animates while the
 * tool runs; otherwise the tool owns the terminal and only start and end
 * lines are printed around its output.
 */
const createProgressCallbacks = ({
  quiet,
}: {
  quiet: boolean;
}): ExecutionCallbacks => {
  const spinner = ora({ spinner: 'dots', isEnabled: quiet ? undefined : false });

  return {
    onStepStart: (invocation) => {
      spinner.start(`${chalk.cyan(invocation.stackKey)} ${invocation.step}`);
    },
    onStepComplete: (invocation, outcome) => {
      const label = `${chalk.cyan(invocation.stackKey)} ${invocation.step} ${chalk.dim(`(${formatDuration(outcome.durationMs)})`)}`;

      if (outcome.success) {
        spinner.succeed(label);
      } else {
        spinner.fail(label);
      }
    },
  };
};

const showDryRun = ({
  config,
  plan,
}: {
  config: StacksConfig;
  plan: CommandPlan;
}): void => {
  const target =
    plan.requestedStacks.length > 0 ? plan.requestedStacks.join(', ') : 'all stacks';

  console.log(chalk.bold(`Dry run for \`${plan.command}\` against ${target}`));
  console.log(chalk.dim(`Stacks file: ${config.filePath}`));

  plan.phases.forEach((phase, phaseIndex) => {
    console.log();
    if (plan.phases.length > 1) {
      console.log(chalk.bold(`Phase ${phaseIndex + 1} (${phase.direction} order):`));
    } else {
      console.log(chalk.dim(`Stacks will be processed in ${phase.direction} order:`));
    }

    phase.stackKeys.forEach((stackKey, index) => {
      const stack = getStack({ graph: config.graph, stackKey });
      console.log(`  ${chalk.cyan(`${index + 1}.`)} ${stackKey}`);

      phase.templates.forEach((template) => {
        const invocation = createInvocation({ tool: config.tool, stack, template });
        console.log(chalk.dim(`     ${formatInvocation(invocation)}`));
      });
    });
  });

  const stackCount = new Set(plan.phases.flatMap((phase) => phase.stackKeys)).size;
  console.log();
  console.log(chalk.dim(`Total: ${stackCount} ${stackCount === 1 ? 'stack' : 'stacks'}`));
};

const showSummary = ({
  command,
  steps,
}: {
  command: string;
  steps: StepResult[];
}): void => {
  if (steps.length === 0) return;

  const succeeded = steps.filter((step) => step.outcome.success);
  const stackCount = new Set(succeeded.map((step) => step.stackKey)).size;
  const totalMs = steps.reduce((sum, step) => sum + step.outcome.durationMs, 0);

  console.error(chalk.dim('─'.repeat(50)));

  if (succeeded.length === steps.length) {
    console.error(
      chalk.green(
        `✓ ${command} completed for ${stackCount} ${stackCount === 1 ? 'stack' : 'stacks'} ${chalk.dim(`(${formatDuration(totalMs)})`)}`
      )
    );
  } else {
    console.error(
      `${chalk.green(`${succeeded.length} steps completed`)} | ${chalk.red(`${steps.length - succeeded.length} failed`)}`
    );
  }
};
