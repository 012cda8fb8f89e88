import { Command, Option } from 'commander';
import { runCommand, type CommandRequest, type GlobalOptions } from './commands/index.js';
import { COMMANDS } from '../core/command-translator.js';
import { parseStackList } from '../utils/format.js';

const increaseVerbosity = (_value: string, previous: number): number =>
  previous + 1;

export const createProgram = ({
  onCommand,
}: {
  onCommand: (request: CommandRequest) => Promise<void>;
}): Command => {
  const program: Command = new Command();

  program
    .name('stacks')
    .description('Run docker compose commands across stacks that depend on each other')
    .version('0.1.0')
    .enablePositionalOptions()
    .passThroughOptions()
    .addOption(
      new Option(
        '-f, --file <path>',
        'The stacks file. By default looks for stacks.yml in the current and parent directories'
      ).env('STACKS_FILE')
    )
    .option(
      '-s, --stacks <names>',
      'Comma separated list of stacks to apply the command to. Applies to all stacks if not present',
      parseStackList
    )
    .option('--dry-run', 'Show the execution plan without running anything')
    .option('-q, --quiet', 'Capture compose output and only show it for failing steps')
    .option('-v, --verbose', 'Increase logging verbosity (repeatable)', increaseVerbosity, 0);

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  COMMANDS.forEach((definition) => {
    program
      .command(definition.name)
      .description(definition.description)
      .argument('[args...]', 'Arguments to pass through to docker compose')
      .allowUnknownOption()
      .passThroughOptions()
      .action(async (args: string[]) => {
        await onCommand({ command: definition.name, args, globals: globals() });
      });
  });

  // Anything else goes to the compose tool as-is
  program
    .argument('[command]', 'Any other docker compose command')
    .argument('[args...]', 'Arguments to pass through to docker compose')
    .action(async (command: string | undefined, args: string[]) => {
      if (!command) {
        program.help();
      }
      await onCommand({ command, args, globals: globals() });
    });

  return program;
};

export const run = async (): Promise<void> => {
  const program = createProgram({
    onCommand: async (request) => {
      process.exitCode = await runCommand(request);
    },
  });

  await program.parseAsync();
};
