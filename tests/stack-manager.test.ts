import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { executeCommandPlan, planCommand, runStacks } from '../src/core/stack-manager.js';
import { InvalidArgumentsError } from '../src/core/errors.js';
import type { Executor } from '../src/types/index.js';
import {
  DOCKER_COMPOSE,
  NETWORKS_GRAPH,
  callLabels,
  createFakeExecutor,
  graphOf,
} from './helpers.js';

describe('planCommand', () => {
  const graph = graphOf(NETWORKS_GRAPH);

  it('brings up a stack after its dependencies', () => {
    const plan = planCommand({ graph, command: 'up', stackNames: ['web'], args: ['-d'] });

    assert.deepStrictEqual(plan, {
      command: 'up',
      requestedStacks: ['web'],
      phases: [
        {
          direction: 'forward',
          stackKeys: ['networks', 'web'],
          templates: [{ step: 'up', subcommand: 'up', args: ['--wait', '-d'] }],
        },
      ],
    });
  });

  it('takes every stack down dependents first', () => {
    const plan = planCommand({ graph, command: 'down', stackNames: [], args: [] });

    assert.equal(plan.phases.length, 1);
    assert.equal(plan.phases[0].direction, 'reverse');
    assert.deepStrictEqual(plan.phases[0].stackKeys, ['web', 'worker', 'networks']);
  });

  it('plans restart as a reverse down followed by a forward up', () => {
    const plan = planCommand({ graph, command: 'restart', stackNames: ['web'], args: ['-t', '5'] });

    assert.deepStrictEqual(
      plan.phases.map((phase) => ({
        direction: phase.direction,
        stackKeys: phase.stackKeys,
        templates: phase.templates.map((t) => [t.subcommand, ...t.args].join(' ')),
      })),
      [
        { direction: 'reverse', stackKeys: ['web', 'networks'], templates: ['down -t 5'] },
        { direction: 'forward', stackKeys: ['networks', 'web'], templates: ['up --wait'] },
      ]
    );
  });

  it('passes other commands through in dependency order', () => {
    const plan = planCommand({ graph, command: 'logs', stackNames: ['worker'], args: ['--tail=5'] });

    assert.deepStrictEqual(plan.phases[0].stackKeys, ['networks', 'worker']);
    assert.deepStrictEqual(plan.phases[0].templates, [
      { step: 'logs', subcommand: 'logs', args: ['--tail=5'] },
    ]);
  });

  it('runs single-stack commands without dependencies', () => {
    const plan = planCommand({
      graph,
      command: 'exec',
      stackNames: ['web'],
      args: ['app', 'sh'],
    });

    assert.deepStrictEqual(plan.phases[0].stackKeys, ['web']);
  });

  it('rejects single-stack commands aimed at several stacks', () => {
    assert.throws(
      () => planCommand({ graph, command: 'exec', stackNames: [], args: ['app', 'sh'] }),
      (error: unknown) =>
        error instanceof InvalidArgumentsError &&
        error.message === 'Command exec can only operate on one stack but 3 were provided.'
    );
    assert.throws(
      () => planCommand({ graph, command: 'port', stackNames: ['web', 'worker'], args: [] }),
      { message: 'Command port can only operate on one stack but 2 were provided.' }
    );
  });
});

describe('executeCommandPlan', () => {
  const graph = graphOf(NETWORKS_GRAPH);

  it('runs phases in turn and reports the failing step last', async () => {
    const { executor, calls } = createFakeExecutor({
      failOn: (invocation) => invocation.stackKey === 'networks' && invocation.step === 'up',
    });
    const completed: string[] = [];

    await assert.rejects(
      executeCommandPlan({
        graph,
        tool: DOCKER_COMPOSE,
        commandPlan: planCommand({ graph, command: 'restart', stackNames: ['web'], args: [] }),
        executor,
        callbacks: {
          onStepComplete: (invocation, result) =>
            completed.push(`${invocation.stackKey}:${invocation.step}:${result.success}`),
        },
      }),
      { message: 'stack "networks" failed during "up": exit code 1' }
    );

    assert.deepStrictEqual(callLabels(calls), ['web:down', 'networks:down', 'networks:up']);
    assert.deepStrictEqual(completed, [
      'web:down:true',
      'networks:down:true',
      'networks:up:false',
    ]);
  });
});

describe('runStacks', () => {
  const graph = graphOf(NETWORKS_GRAPH);

  it('runs update as pull then up for each stack in order', async () => {
    const { executor, calls } = createFakeExecutor();

    const result = await runStacks({
      graph,
      tool: DOCKER_COMPOSE,
      command: 'update',
      stackNames: ['web'],
      args: [],
      executor,
    });

    assert.equal(result.success, true);
    assert.deepStrictEqual(callLabels(calls), [
      'networks:pull',
      'networks:up',
      'web:pull',
      'web:up',
    ]);
    assert.deepStrictEqual(calls[2].args, ['compose', '-p', 'web', 'pull']);
    assert.deepStrictEqual(calls[3].args, ['compose', '-p', 'web', 'up', '--wait']);
    assert.equal(result.steps.length, 4);
  });

  it('restarts every stack down then up', async () => {
    const { executor, calls } = createFakeExecutor();

    await runStacks({
      graph,
      tool: DOCKER_COMPOSE,
      command: 'restart',
      stackNames: [],
      args: [],
      executor,
    });

    assert.deepStrictEqual(callLabels(calls), [
      'web:down',
      'worker:down',
      'networks:down',
      'networks:up',
      'web:up',
      'worker:up',
    ]);
  });

  it('reports the failing stack and step and stops there', async () => {
    const { executor, calls } = createFakeExecutor({
      failOn: (invocation) => invocation.stackKey === 'networks' && invocation.step === 'pull',
    });

    const result = await runStacks({
      graph,
      tool: DOCKER_COMPOSE,
      command: 'update',
      stackNames: ['web'],
      args: [],
      executor,
    });

    assert.equal(calls.length, 1);
    assert.equal(result.success, false);
    if (result.success) return;

    assert.deepStrictEqual(result.failure, {
      kind: 'stack-operation',
      message: 'stack "networks" failed during "pull": exit code 1',
      stackName: 'networks',
      step: 'pull',
    });
    assert.deepStrictEqual(
      result.steps.map((step) => [step.stackKey, step.step, step.outcome.success]),
      [['networks', 'pull', false]]
    );
  });

  it('reports an unknown stack without running anything', async () => {
    const { executor, calls } = createFakeExecutor();

    const result = await runStacks({
      graph,
      tool: DOCKER_COMPOSE,
      command: 'up',
      stackNames: ['biz'],
      args: [],
      executor,
    });

    assert.equal(calls.length, 0);
    assert.deepStrictEqual(result, {
      success: false,
      plan: null,
      steps: [],
      failure: { kind: 'unknown-stack', message: 'unknown stack "biz"', stackName: 'biz' },
    });
  });

  it('reports a dependency cycle without running anything', async () => {
    const { executor, calls } = createFakeExecutor();

    const result = await runStacks({
      graph: graphOf({ foo: ['bar'], bar: ['foo'] }),
      tool: DOCKER_COMPOSE,
      command: 'up',
      stackNames: [],
      args: [],
      executor,
    });

    assert.equal(calls.length, 0);
    assert.equal(result.success, false);
    if (result.success) return;

    assert.deepStrictEqual(result.failure, {
      kind: 'cycle',
      message: 'dependency cycle detected: bar -> foo -> bar',
    });
  });

  it('reports a cycle behind a single-stack command without running it', async () => {
    const { executor, calls } = createFakeExecutor();

    const result = await runStacks({
      graph: graphOf({ a: ['b'], b: ['a'] }),
      tool: DOCKER_COMPOSE,
      command: 'exec',
      stackNames: ['a'],
      args: ['svc', 'sh'],
      executor,
    });

    assert.equal(calls.length, 0);
    assert.equal(result.success, false);
    if (result.success) return;

    assert.deepStrictEqual(result.failure, {
      kind: 'cycle',
      message: 'dependency cycle detected: a -> b -> a',
    });
  });

  it('reports malformed arguments', async () => {
    const { executor, calls } = createFakeExecutor();

    const result = await runStacks({
      graph,
      tool: DOCKER_COMPOSE,
      command: 'up',
      stackNames: ['web'],
      args: ['-d', 'bad\0arg'],
      executor,
    });

    assert.equal(calls.length, 0);
    assert.equal(result.success, false);
    if (result.success) return;

    assert.deepStrictEqual(result.failure, {
      kind: 'invalid-arguments',
      message: 'argument 2 for "up" contains a NUL character',
    });
  });

  it('passes empty arguments through to the tool', async () => {
    const { executor, calls } = createFakeExecutor();

    await runStacks({
      graph,
      tool: DOCKER_COMPOSE,
      command: 'run',
      stackNames: ['web'],
      args: ['app', 'sh', '-c', ''],
      executor,
    });

    assert.deepStrictEqual(calls[0].args, ['compose', '-p', 'web', 'run', 'app', 'sh', '-c', '']);
  });

  it('leaves unrelated stacks alone', async () => {
    const { executor, calls } = createFakeExecutor();

    await runStacks({
      graph,
      tool: DOCKER_COMPOSE,
      command: 'stop',
      stackNames: ['networks'],
      args: [],
      executor,
    });

    assert.deepStrictEqual(callLabels(calls), ['networks:stop']);
  });

  it('returns the plan without executing on a dry run', async () => {
    const { executor, calls } = createFakeExecutor();

    const result = await runStacks({
      graph,
      tool: DOCKER_COMPOSE,
      command: 'up',
      stackNames: ['worker'],
      args: [],
      executor,
      dryRun: true,
    });

    assert.equal(calls.length, 0);
    assert.equal(result.success, true);
    assert.deepStrictEqual(result.plan?.phases[0].stackKeys, ['networks', 'worker']);
  });

  it('still forwards completed steps to the caller', async () => {
    const { executor } = createFakeExecutor();
    const completed: string[] = [];

    await runStacks({
      graph,
      tool: DOCKER_COMPOSE,
      command: 'pull',
      stackNames: ['worker'],
      args: [],
      executor,
      callbacks: {
        onStepComplete: (invocation) => completed.push(invocation.stackKey),
      },
    });

    assert.deepStrictEqual(completed, ['networks', 'worker']);
  });

  it('lets unexpected errors propagate', async () => {
    const executor: Executor = async () => {
      throw new Error('spawn exploded');
    };

    await assert.rejects(
      runStacks({
        graph,
        tool: DOCKER_COMPOSE,
        command: 'up',
        stackNames: ['networks'],
        args: [],
        executor,
      }),
      { message: 'spawn exploded' }
    );
  });
});
