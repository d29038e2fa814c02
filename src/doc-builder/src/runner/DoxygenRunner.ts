/**
 * DoxygenRunner - Run `doxygen -` with a configuration stream on stdin.
 */

import { spawn } from 'child_process';
import { Readable, Writable } from 'stream';
import { RunResult } from '../types';
import { DoxygenExitError, DoxygenNotFoundError, errnoCode } from '../errors';

/** The parts of a child process the runner talks to */
export interface SpawnedProcess {
  stdin: Writable | null;
  stdout: Readable | null;
  stderr: Readable | null;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'close', listener: (code: number | null) => void): unknown;
}

export type SpawnFn = (
  command: string,
  args: string[],
  options: { cwd?: string; env?: NodeJS.ProcessEnv }
) => SpawnedProcess;

export interface DoxygenRunnerOptions {
  /** doxygen binary name or path (default: doxygen) */
  binary?: string;
  env?: NodeJS.ProcessEnv;
  /** Receives doxygen's output lines */
  log?: (line: string) => void;
  spawn?: SpawnFn;
}

interface ProcessOutput {
  code: number | null;
  stdout: string;
  stderr: string;
}

const defaultSpawn: SpawnFn = (command, args, options) =>
  spawn(command, args, { ...options, stdio: ['pipe', 'pipe', 'pipe'] });

const WARNING_LINE = /\bwarning:/i;

export class DoxygenRunner {
  readonly binary: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly log: (line: string) => void;
  private readonly spawnFn: SpawnFn;

  constructor(options: DoxygenRunnerOptions = {}) {
    this.binary = options.binary ?? 'doxygen';
    this.env = options.env ?? process.env;
    this.log = options.log ?? (() => undefined);
    this.spawnFn = options.spawn ?? defaultSpawn;
  }

  /**
   * Feed the configuration stream to `doxygen -` and wait for it to finish.
   *
   * @param cwd - Directory relative paths in the configuration resolve against
   * @throws DoxygenNotFoundError when the binary cannot be started
   * @throws DoxygenExitError when doxygen exits non-zero
   */
  async run(stream: string, cwd?: string): Promise<RunResult> {
    const started = Date.now();
    const output = await this.execute(['-'], stream, cwd);

    if (output.code !== 0) {
      throw new DoxygenExitError(output.code, output.stderr);
    }

    const warnings = output.stderr
      .split('\n')
      .map((line) => line.trimEnd())
      .filter((line) => WARNING_LINE.test(line));

    return {
      exit_code: 0,
      warnings,
      duration_ms: Date.now() - started,
    };
  }

  /**
   * Installed doxygen version, or null when the binary is missing.
   */
  async version(): Promise<string | null> {
    try {
      const output = await this.execute(['--version'], null);
      if (output.code !== 0) {
        throw new DoxygenExitError(output.code, output.stderr);
      }
      return output.stdout.trim();
    } catch (error) {
      if (error instanceof DoxygenNotFoundError) {
        return null;
      }
      throw error;
    }
  }

  private execute(args: string[], input: string | null, cwd?: string): Promise<ProcessOutput> {
    return new Promise((resolve, reject) => {
      let child: SpawnedProcess;
      try {
        child = this.spawnFn(this.binary, args, { cwd, env: this.env });
      } catch (error) {
        reject(this.translateError(error));
        return;
      }

      let stdout = '';
      let stderr = '';
      const stdoutLines = this.lineLogger();
      const stderrLines = this.lineLogger();

      // Decode as UTF-8 across chunk boundaries
      child.stdout?.setEncoding('utf8');
      child.stderr?.setEncoding('utf8');

      child.stdout?.on('data', (chunk: string) => {
        stdout += chunk;
        stdoutLines.push(chunk);
      });
      child.stderr?.on('data', (chunk: string) => {
        stderr += chunk;
        stderrLines.push(chunk);
      });

      child.on('error', (error: Error) => {
        reject(this.translateError(error));
      });
      child.on('close', (code: number | null) => {
        stdoutLines.flush();
        stderrLines.flush();
        resolve({ code, stdout, stderr });
      });

      if (child.stdin) {
        // doxygen may exit before reading all of stdin; the exit code reports that
        child.stdin.on('error', (error: Error) => {
          this.log(`stdin: ${error.message}`);
        });
        child.stdin.end(input ?? undefined);
      }
    });
  }

  /**
   * Pass whole lines to the log; a line split across chunks is held until
   * its newline arrives or the stream closes.
   */
  private lineLogger(): { push(chunk: string): void; flush(): void } {
    let pending = '';
    const emit = (line: string): void => {
      if (line.trim()) {
        this.log(line.trimEnd());
      }
    };

    return {
      push: (chunk: string) => {
        const lines = (pending + chunk).split('\n');
        pending = lines.pop() ?? '';
        lines.forEach(emit);
      },
      flush: () => {
        emit(pending);
        pending = '';
      },
    };
  }

  private translateError(error: unknown): unknown {
    if (errnoCode(error) === 'ENOENT') {
      return new DoxygenNotFoundError(this.binary);
    }
    return error;
  }
}
