import type { PlanDirection, StackGraph } from '../types/index.js';
import { CycleError, UnknownStackError } from './errors.js';
import { compareKeys, getDependencies } from './stack-graph.js';
import { logger } from '../utils/logger.js';

type VisitState = 'in-progress' | 'done';

interface CycleDetectionResult {
  hasCycle: boolean;
  cycleNodes: string[];
}

/**
 * Detect a cycle among the given stacks using a three-colour DFS. Edges
 * leaving the set are ignored. The reported path starts and ends on the
 * same stack, e.g. a -> b -> a.
 */
export const detectCycle = ({
  graph,
  stackKeys,
}: {
  graph: StackGraph;
  stackKeys: ReadonlySet<string>;
}): CycleDetectionResult => {
  const states = new Map<string, VisitState>();
  const path: string[] = [];

  const dfs = (stackKey: string): string[] | null => {
    states.set(stackKey, 'in-progress');
    path.push(stackKey);

    for (const depKey of getDependencies({ graph, stackKey })) {
      if (!stackKeys.has(depKey)) continue;

      const state = states.get(depKey);
      if (state === 'in-progress') {
        return [...path.slice(path.indexOf(depKey)), depKey];
      }
      if (state === undefined) {
        const cycle = dfs(depKey);
        if (cycle) return cycle;
      }
    }

    path.pop();
    states.set(stackKey, 'done');
    return null;
  };

  for (const stackKey of [...stackKeys].sort(compareKeys)) {
    if (!states.has(stackKey)) {
      const cycle = dfs(stackKey);
      if (cycle) {
        return { hasCycle: true, cycleNodes: cycle };
      }
    }
  }

  return { hasCycle: false, cycleNodes: [] };
};

const assertAcyclic = ({
  graph,
  stackKeys,
}: {
  graph: StackGraph;
  stackKeys: ReadonlySet<string>;
}): void => {
  const { hasCycle, cycleNodes } = detectCycle({ graph, stackKeys });
  if (hasCycle) {
    throw new CycleError(cycleNodes);
  }
};

const assertKnownDependencies = ({
  graph,
  stackKey,
}: {
  graph: StackGraph;
  stackKey: string;
}): readonly string[] => {
  const dependencies = getDependencies({ graph, stackKey });

  dependencies.forEach((depKey) => {
    if (!graph.stacks.has(depKey)) {
      throw new UnknownStackError(depKey, stackKey);
    }
  });

  return dependencies;
};

/**
 * Check the whole graph: every edge must point at a known stack and the
 * dependency relation must be acyclic
 */
export const validateStackGraph = ({ graph }: { graph: StackGraph }): void => {
  const stackKeys = [...graph.stacks.keys()].sort(compareKeys);

  stackKeys.forEach((stackKey) => {
    assertKnownDependencies({ graph, stackKey });
  });

  assertAcyclic({ graph, stackKeys: new Set(stackKeys) });
};

/**
 * Resolve the stacks a request touches. An empty request means every stack.
 * With dependencies, the result is the transitive closure of the request
 * over the depends-on relation. Without, only the requested stacks are
 * returned, but the closure is still checked for unknown stacks and cycles.
 */
export const resolveStacks = ({
  graph,
  stackNames,
  withDependencies = true,
}: {
  graph: StackGraph;
  stackNames: readonly string[];
  withDependencies?: boolean;
}): ReadonlySet<string> => {
  const requested =
    stackNames.length === 0 ? [...graph.stacks.keys()] : [...stackNames];

  requested.forEach((stackName) => {
    if (!graph.stacks.has(stackName)) {
      throw new UnknownStackError(stackName);
    }
  });

  const resolved = new Set(requested);
  const toVisit = [...resolved];

  while (toVisit.length > 0) {
    const stackKey = toVisit.pop();
    if (stackKey === undefined) continue;

    const dependencies = assertKnownDependencies({ graph, stackKey });

    dependencies.forEach((depKey) => {
      if (!resolved.has(depKey)) {
        resolved.add(depKey);
        toVisit.push(depKey);
      }
    });
  }

  assertAcyclic({ graph, stackKeys: resolved });

  const sorted = new Set(
    (withDependencies ? [...resolved] : requested).sort(compareKeys)
  );

  logger.trace(
    `Resolved ${stackNames.length > 0 ? stackNames.join(',') : 'all stacks'} to ${[...sorted].join(',')}`
  );

  return sorted;
};

const insertSorted = (queue: string[], stackKey: string): void => {
  const index = queue.findIndex((queued) => compareKeys(queued, stackKey) > 0);
  if (index === -1) {
    queue.push(stackKey);
  } else {
    queue.splice(index, 0, stackKey);
  }
};

/**
 * Order a resolved set of stacks using Kahn's algorithm. Forward puts
 * dependencies first, reverse puts dependents first. Stacks that become
 * ready together are taken in ascending key order.
 */
export const orderStacks = ({
  graph,
  stackKeys,
  direction,
}: {
  graph: StackGraph;
  stackKeys: ReadonlySet<string>;
  direction: PlanDirection;
}): string[] => {
  stackKeys.forEach((stackKey) => {
    if (!graph.stacks.has(stackKey)) {
      throw new UnknownStackError(stackKey);
    }
  });

  assertAcyclic({ graph, stackKeys });

  const inDegree = new Map<string, number>();
  const followers = new Map<string, string[]>();

  stackKeys.forEach((stackKey) => {
    inDegree.set(stackKey, 0);
    followers.set(stackKey, []);
  });

  stackKeys.forEach((stackKey) => {
    const dependencies = new Set(getDependencies({ graph, stackKey }));

    dependencies.forEach((depKey) => {
      if (!stackKeys.has(depKey)) return;

      // Forward: the stack waits on its dependency. Reverse: the other way round.
      const [before, after] =
        direction === 'forward' ? [depKey, stackKey] : [stackKey, depKey];
      inDegree.set(after, (inDegree.get(after) ?? 0) + 1);
      followers.get(before)?.push(after);
    });
  });

  const ready = [...stackKeys]
    .filter((stackKey) => inDegree.get(stackKey) === 0)
    .sort(compareKeys);
  const sortedStackKeys: string[] = [];

  while (ready.length > 0) {
    const stackKey = ready.shift();
    if (stackKey === undefined) continue;

    sortedStackKeys.push(stackKey);

    followers.get(stackKey)?.forEach((follower) => {
      const remaining = (inDegree.get(follower) ?? 0) - 1;
      inDegree.set(follower, remaining);

      if (remaining === 0) {
        insertSorted(ready, follower);
      }
    });
  }

  if (sortedStackKeys.length !== stackKeys.size) {
    const unsorted = [...stackKeys]
      .filter((stackKey) => !sortedStackKeys.includes(stackKey))
      .sort(compareKeys);
    throw new CycleError(unsorted);
  }

  return sortedStackKeys;
};
