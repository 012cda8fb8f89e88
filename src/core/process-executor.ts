import { spawn } from 'child_process';
import type { Executor, InvocationOutcome } from '../types/index.js';
import { formatInvocation } from './executor.js';

export type ProcessStdio = 'inherit' | 'pipe';

/**
 * Executor that spawns the compose tool as a child process. With 'inherit'
 * the tool writes straight to the terminal; with 'pipe' its output is
 * collected into the outcome.
 */
export const createProcessExecutor = ({
  stdio = 'inherit',
}: {
  stdio?: ProcessStdio;
} = {}): Executor => {
  return (invocation, options) => {
    const startTime = Date.now();
    const command = formatInvocation(invocation);

    return new Promise<InvocationOutcome>((resolve) => {
      const outputChunks: string[] = [];

      const child = spawn(invocation.program, invocation.args, {
        cwd: invocation.cwd,
        env: { ...process.env, ...invocation.env },
        stdio: stdio === 'inherit' ? 'inherit' : ['inherit', 'pipe', 'pipe'],
        signal: options?.signal,
      });

      const collect = (data: Buffer): void => {
        const text = data.toString();
        outputChunks.push(text);
        options?.onOutput?.(text);
      };

      child.stdout?.on('data', collect);
      child.stderr?.on('data', collect);

      child.on('error', (error) => {
        resolve({
          success: false,
          exitCode: null,
          signal: null,
          output: outputChunks.join(''),
          errorMessage: `Error running command \`${command}\`: ${error.message}`,
          durationMs: Date.now() - startTime,
        });
      });

      child.on('close', (code, signal) => {
        const success = code === 0;
        const status = signal ? `signal ${signal}` : `exit code ${code}`;

        resolve({
          success,
          exitCode: code,
          signal,
          output: outputChunks.join(''),
          errorMessage: success ? null : `Error running command \`${command}\`: ${status}`,
          durationMs: Date.now() - startTime,
        });
      });
    });
  };
};
