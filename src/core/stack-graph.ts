import { resolve } from 'path';
import type { Stack, StackDefinition, StackGraph } from '../types/index.js';
import { ConfigError, UnknownStackError } from './errors.js';

/**
 * Build a stack graph from stack definitions, filling in defaults.
 * References are not checked here, see validateStackGraph.
 */
export const createStackGraph = ({
  baseDir,
  stacks,
}: {
  baseDir: string;
  stacks: StackDefinition[];
}): StackGraph => {
  const stackMap = new Map<string, Stack>();
  const dependencies = new Map<string, readonly string[]>();

  stacks.forEach((definition) => {
    if (stackMap.has(definition.key)) {
      throw new ConfigError(`duplicate stack "${definition.key}"`, {
        stackName: definition.key,
      });
    }

    // Keep first occurrence of a repeated reference
    const dependsOn = [...new Set(definition.dependsOn ?? [])];

    stackMap.set(definition.key, {
      key: definition.key,
      name: definition.name || definition.key,
      directory: resolve(baseDir, definition.directory || definition.key),
      files: [...(definition.files ?? [])],
      environment: { ...(definition.environment ?? {}) },
      dependsOn,
    });
    dependencies.set(definition.key, dependsOn);
  });

  return { stacks: stackMap, dependencies };
};

/**
 * Look up a stack by key
 */
export const getStack = ({
  graph,
  stackKey,
}: {
  graph: StackGraph;
  stackKey: string;
}): Stack => {
  const stack = graph.stacks.get(stackKey);

  if (!stack) {
    throw new UnknownStackError(stackKey);
  }

  return stack;
};

/**
 * Get the declared dependencies of a stack
 */
export const getDependencies = ({
  graph,
  stackKey,
}: {
  graph: StackGraph;
  stackKey: string;
}): readonly string[] => graph.dependencies.get(stackKey) ?? [];

/**
 * Code-unit ordering of stack keys, independent of the current locale
 */
export const compareKeys = (a: string, b: string): number => {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
};
