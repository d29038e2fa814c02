/**
 * Error types raised by the documentation builder.
 */

export class DocBuildError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed Doxyfile content */
export class DoxyfileSyntaxError extends DocBuildError {
  constructor(
    public readonly file: string,
    public readonly line: number,
    detail: string
  ) {
    super(`${file}:${line}: ${detail}`);
  }
}

/** Invalid or unreadable docbuild.yml */
export class ConfigError extends DocBuildError {
  constructor(public readonly source: string, detail: string) {
    super(`${source}: ${detail}`);
  }
}

/** The doxygen binary could not be started */
export class DoxygenNotFoundError extends DocBuildError {
  constructor(public readonly binary: string) {
    super(`doxygen binary not found: ${binary}`);
  }
}

/** doxygen ran and exited non-zero */
export class DoxygenExitError extends DocBuildError {
  constructor(
    public readonly exitCode: number | null,
    public readonly stderr: string
  ) {
    const tail = stderr.trim().split('\n').slice(-5).join('\n');
    super(
      `doxygen exited with ${exitCode === null ? 'a signal' : `code ${exitCode}`}` +
        (tail ? `\n${tail}` : '')
    );
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

/**
 * `code` of a Node system error (ENOENT, EACCES, ...). Errors raised by fs
 * and child_process may come from another realm, so this does not rely on
 * `instanceof Error`.
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}
