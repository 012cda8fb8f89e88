import type {
  CommandTranslation,
  InvocationTemplate,
  PlanDirection,
} from '../types/index.js';
import { InvalidArgumentsError } from './errors.js';

const WAIT_FLAG = '--wait';

export type CommandDefinition =
  | { kind: 'up'; name: string; description: string }
  | { kind: 'update'; name: string; description: string }
  | { kind: 'restart'; name: string; description: string }
  | {
      kind: 'ordered';
      name: string;
      description: string;
      direction: PlanDirection;
    }
  | { kind: 'single-stack'; name: string; description: string };

export const COMMANDS: CommandDefinition[] = [
  { kind: 'ordered', name: 'build', description: 'Build or rebuild services', direction: 'forward' },
  { kind: 'single-stack', name: 'cp', description: 'Copy files/folders between a service container and the local filesystem' },
  { kind: 'ordered', name: 'create', description: 'Create containers for a service', direction: 'forward' },
  { kind: 'ordered', name: 'down', description: 'Stop and remove containers, networks', direction: 'reverse' },
  { kind: 'single-stack', name: 'events', description: 'Receive real time events from containers' },
  { kind: 'single-stack', name: 'exec', description: 'Execute a command in a running container' },
  { kind: 'ordered', name: 'images', description: 'List images used by the created containers', direction: 'forward' },
  { kind: 'ordered', name: 'kill', description: 'Force stop service containers', direction: 'reverse' },
  { kind: 'ordered', name: 'ls', description: 'List running compose projects', direction: 'forward' },
  { kind: 'ordered', name: 'pause', description: 'Pause services', direction: 'reverse' },
  { kind: 'single-stack', name: 'port', description: 'Print the public port for a port binding' },
  { kind: 'ordered', name: 'ps', description: 'List containers', direction: 'forward' },
  { kind: 'ordered', name: 'pull', description: 'Pull service images', direction: 'forward' },
  { kind: 'ordered', name: 'push', description: 'Push service images', direction: 'forward' },
  { kind: 'restart', name: 'restart', description: 'Take stacks down, then bring them back up' },
  { kind: 'ordered', name: 'rm', description: 'Remove stopped service containers', direction: 'reverse' },
  { kind: 'single-stack', name: 'run', description: 'Run a one-off command on a service' },
  { kind: 'ordered', name: 'start', description: 'Start services', direction: 'forward' },
  { kind: 'ordered', name: 'stop', description: 'Stop services', direction: 'reverse' },
  { kind: 'ordered', name: 'unpause', description: 'Unpause services', direction: 'forward' },
  { kind: 'up', name: 'up', description: 'Create and start containers, waiting for them to be running/healthy' },
  { kind: 'update', name: 'update', description: 'Pull images, then recreate and start containers' },
];

const COMMAND_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_-]*$/;

export const findCommand = (name: string): CommandDefinition | undefined =>
  COMMANDS.find((command) => command.name === name);

const template = (step: string, args: string[]): InvocationTemplate => ({
  step,
  subcommand: step,
  args,
});

const validateArguments = ({
  command,
  args,
}: {
  command: string;
  args: readonly string[];
}): void => {
  if (!COMMAND_NAME_PATTERN.test(command)) {
    throw new InvalidArgumentsError(`invalid command name "${command}"`, {
      command,
    });
  }

  args.forEach((arg, index) => {
    if (arg.includes('\0')) {
      throw new InvalidArgumentsError(
        `argument ${index + 1} for "${command}" contains a NUL character`,
        { command, index }
      );
    }
  });
};

/**
 * Translate a user command into stack-agnostic invocation templates.
 * Commands missing from the table pass through as a single forward step.
 */
export const translateCommand = ({
  command,
  args,
}: {
  command: string;
  args: readonly string[];
}): CommandTranslation => {
  validateArguments({ command, args });

  const passthroughArgs = [...args];
  const definition = findCommand(command);

  if (!definition) {
    return {
      command,
      scope: 'dependencies',
      phases: [
        { direction: 'forward', templates: [template(command, passthroughArgs)] },
      ],
    };
  }

  switch (definition.kind) {
    case 'up':
      return {
        command,
        scope: 'dependencies',
        phases: [
          {
            direction: 'forward',
            templates: [template('up', [WAIT_FLAG, ...passthroughArgs])],
          },
        ],
      };
    case 'update':
      return {
        command,
        scope: 'dependencies',
        phases: [
          {
            direction: 'forward',
            templates: [
              template('pull', []),
              template('up', [WAIT_FLAG, ...passthroughArgs]),
            ],
          },
        ],
      };
    case 'restart':
      return {
        command,
        scope: 'dependencies',
        phases: [
          { direction: 'reverse', templates: [template('down', passthroughArgs)] },
          { direction: 'forward', templates: [template('up', [WAIT_FLAG])] },
        ],
      };
    case 'ordered':
      return {
        command,
        scope: 'dependencies',
        phases: [
          {
            direction: definition.direction,
            templates: [template(command, passthroughArgs)],
          },
        ],
      };
    case 'single-stack':
      return {
        command,
        scope: 'single',
        phases: [
          { direction: 'forward', templates: [template(command, passthroughArgs)] },
        ],
      };
  }
};
