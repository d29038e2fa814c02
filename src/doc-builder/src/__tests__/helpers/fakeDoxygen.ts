/**
 * In-process stand-in for the doxygen binary.
 */

import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { SpawnFn } from '../../runner';

export interface FakeDoxygenBehavior {
  stdout?: string;
  stderr?: string;
  /** Raw output written chunk by chunk, after stdout/stderr */
  stdoutChunks?: Buffer[];
  stderrChunks?: Buffer[];
  exitCode?: number | null;
  /** Emit a spawn error with this code instead of running */
  spawnError?: string;
}

export interface SpawnCall {
  command: string;
  args: string[];
  cwd?: string;
  stdin: string;
}

export class FakeProcess extends EventEmitter {
  stdin = new PassThrough();
  stdout = new PassThrough();
  stderr = new PassThrough();
}

/**
 * Build a spawn function whose processes read stdin to the end, print the
 * configured output and exit with the configured code.
 */
export function fakeDoxygen(behavior: FakeDoxygenBehavior = {}): { spawn: SpawnFn; calls: SpawnCall[] } {
  const calls: SpawnCall[] = [];

  const spawn: SpawnFn = (command, args, options) => {
    const proc = new FakeProcess();
    const call: SpawnCall = { command, args, cwd: options.cwd, stdin: '' };
    calls.push(call);

    if (behavior.spawnError) {
      const error = Object.assign(new Error(`spawn ${command} ${behavior.spawnError}`), {
        code: behavior.spawnError,
      });
      setImmediate(() => proc.emit('error', error));
      return proc;
    }

    proc.stdin.on('data', (chunk: Buffer) => {
      call.stdin += chunk.toString();
    });
    proc.stdin.on('end', () => {
      if (behavior.stdout) proc.stdout.write(behavior.stdout);
      if (behavior.stderr) proc.stderr.write(behavior.stderr);
      for (const chunk of behavior.stdoutChunks ?? []) proc.stdout.write(chunk);
      for (const chunk of behavior.stderrChunks ?? []) proc.stderr.write(chunk);
      setTimeout(() => proc.emit('close', behavior.exitCode ?? 0), 10);
    });

    return proc;
  };

  return { spawn, calls };
}
