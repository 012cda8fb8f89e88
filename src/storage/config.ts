import { readFile, stat } from 'fs/promises';
import { dirname, join, resolve } from 'path';
import * as yaml from 'js-yaml';
import type { ZodIssue } from 'zod';
import type { StackDefinition, StacksConfig, ToolCommand } from '../types/index.js';
import { ConfigError, getErrorMessage } from '../core/errors.js';
import { createStackGraph } from '../core/stack-graph.js';
import { validateStackGraph } from '../core/dependency-graph.js';
import { findUnknownKeys, stacksFileSchema, type StackEntry } from './schema.js';
import { logger } from '../utils/logger.js';

const STACKS_FILE_NAMES = ['stacks.yml', 'stacks.yaml'];

const DEFAULT_COMMAND = 'docker compose';

const isFile = async (filePath: string): Promise<boolean> => {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
};

/**
 * Locate the stacks file. An explicit path is resolved against cwd;
 * otherwise cwd and each of its parents are searched.
 */
export const findStacksFile = async ({
  file,
  cwd = process.cwd(),
}: {
  file?: string | null;
  cwd?: string;
}): Promise<string> => {
  if (file) {
    const target = resolve(cwd, file);
    if (await isFile(target)) {
      return target;
    }
    throw new ConfigError(`The file ${file} does not exist or is not a file.`, {
      file,
    });
  }

  let dir = resolve(cwd);

  for (;;) {
    for (const fileName of STACKS_FILE_NAMES) {
      const target = join(dir, fileName);
      if (await isFile(target)) {
        return target;
      }
    }

    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  throw new ConfigError(
    'No stacks.yml file present in the current directory or any of its parents.'
  );
};

export const parseToolCommand = (command: string): ToolCommand => {
  const [program = '', ...args] = command.trim().split(/\s+/);
  return { program, args };
};

const formatIssue = (issue: ZodIssue): string =>
  issue.path.length > 0
    ? `${issue.path.join('.')}: ${issue.message}`
    : issue.message;

const toStackDefinition = (key: string, entry: StackEntry | null): StackDefinition => {
  const file = entry?.file;

  return {
    key,
    name: entry?.name,
    directory: entry?.directory,
    files: typeof file === 'string' ? [file] : file,
    environment: entry?.environment,
    dependsOn: entry?.depends_on,
  };
};

/**
 * Parse stacks file content into a validated configuration. Stack
 * directories are resolved against the file's own directory.
 */
export const parseStacksConfig = ({
  content,
  filePath,
}: {
  content: string;
  filePath: string;
}): StacksConfig => {
  let document: unknown;

  try {
    document = yaml.load(content, { filename: filePath });
  } catch (error) {
    throw new ConfigError(`Failed to parse ${filePath}: ${getErrorMessage(error)}`, {
      filePath,
    });
  }

  const parsed = stacksFileSchema.safeParse(document ?? {});

  if (!parsed.success) {
    const issues = parsed.error.issues.map(formatIssue).join('; ');
    throw new ConfigError(`Invalid stacks file ${filePath}: ${issues}`, {
      filePath,
    });
  }

  findUnknownKeys(parsed.data).forEach((key) => {
    logger.warn(`Ignoring unknown key "${key}" in ${filePath}`);
  });

  const baseDir = dirname(filePath);
  const entries = Object.entries(parsed.data.stacks ?? {});

  try {
    const graph = createStackGraph({
      baseDir,
      stacks: entries.map(([key, entry]) => toStackDefinition(key, entry)),
    });
    validateStackGraph({ graph });

    return {
      filePath,
      baseDir,
      tool: parseToolCommand(parsed.data.command ?? DEFAULT_COMMAND),
      graph,
    };
  } catch (error) {
    if (error instanceof Error) {
      error.message = `${error.message} in ${filePath}`;
    }
    throw error;
  }
};

/**
 * Find, read and parse the stacks file
 */
export const loadStacksConfig = async ({
  file,
  cwd,
}: {
  file?: string | null;
  cwd?: string;
} = {}): Promise<StacksConfig> => {
  const filePath = await findStacksFile({ file, cwd });
  logger.debug(`Loading stacks from ${filePath}`);

  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Failed to open file ${filePath}: ${getErrorMessage(error)}`, {
      filePath,
    });
  }

  return parseStacksConfig({ content, filePath });
};
