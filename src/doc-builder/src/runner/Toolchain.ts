/**
 * Toolchain - Check that doxygen and the input filters it is configured
 * with (doxypy for Python sources) can be found.
 */

import * as fs from 'fs/promises';
import { constants } from 'fs';
import * as path from 'path';
import { DoxygenSettings, ToolStatus, ToolchainReport } from '../types';
import { DoxygenRunner } from './DoxygenRunner';
import { errorMessage } from '../errors';

export interface ToolchainOptions {
  runner: DoxygenRunner;
  /** Directory the Doxyfile lives in */
  baseDir: string;
  env?: NodeJS.ProcessEnv;
}

const INTERPRETERS = /^python[0-9.]*$/;

/**
 * Resolve a command the way a shell would, through PATH when it is bare.
 */
export async function findOnPath(
  command: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Promise<string | null> {
  if (command.includes('/') || command.includes(path.sep)) {
    const resolved = path.resolve(cwd, command);
    return (await isExecutable(resolved)) ? resolved : null;
  }

  const dirs = (env.PATH ?? '').split(path.delimiter).filter((d) => d.length > 0);
  for (const dir of dirs) {
    const candidate = path.join(dir, command);
    if (await isExecutable(candidate)) {
      return candidate;
    }
  }
  return null;
}

async function isExecutable(file: string): Promise<boolean> {
  try {
    const stat = await fs.stat(file);
    if (!stat.isFile()) return false;
    await fs.access(file, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

/**
 * Filter command lines named by INPUT_FILTER, FILTER_PATTERNS and
 * FILTER_SOURCE_PATTERNS (the part after `pattern=`).
 */
export function filterCommands(settings: DoxygenSettings): string[] {
  const commands: string[] = [];

  for (const value of settings.get('INPUT_FILTER') ?? []) {
    if (value.trim()) commands.push(value.trim());
  }

  for (const key of ['FILTER_PATTERNS', 'FILTER_SOURCE_PATTERNS']) {
    for (const value of settings.get(key) ?? []) {
      const eq = value.indexOf('=');
      const command = eq >= 0 ? value.slice(eq + 1).trim() : '';
      if (command) commands.push(command);
    }
  }

  return [...new Set(commands)];
}

/**
 * Check a filter command line: its program, and for an interpreter
 * invocation like `python doxypy.py`, the script too.
 */
async function checkFilter(
  commandLine: string,
  options: ToolchainOptions
): Promise<ToolStatus[]> {
  const env = options.env ?? process.env;
  const [program, script] = commandLine.split(/\s+/);
  const statuses: ToolStatus[] = [];

  if (!program) return statuses;

  statuses.push({
    name: program,
    found: await findOnPath(program, env, options.baseDir),
    required: true,
  });

  if (script && INTERPRETERS.test(path.basename(program))) {
    const scriptPath = path.resolve(options.baseDir, script);
    statuses.push({
      name: script,
      found: (await exists(scriptPath)) ? scriptPath : null,
      required: true,
    });
  }

  return statuses;
}

/**
 * Report on every tool the configuration needs. Missing tools are reported,
 * never thrown.
 */
export async function checkToolchain(
  settings: DoxygenSettings,
  options: ToolchainOptions
): Promise<ToolchainReport> {
  const doxygen: ToolStatus = {
    name: options.runner.binary,
    found: null,
    required: true,
  };
  try {
    doxygen.found = await options.runner.version();
  } catch (error) {
    // present but broken, e.g. a non-zero exit on --version
    doxygen.error = errorMessage(error);
  }

  const filters: ToolStatus[] = [];
  for (const command of filterCommands(settings)) {
    filters.push(...(await checkFilter(command, options)));
  }

  let layoutFile: ToolStatus | undefined;
  const layout = settings.get('LAYOUT_FILE')?.[0];
  if (layout) {
    const layoutPath = path.resolve(options.baseDir, layout);
    layoutFile = {
      name: layout,
      found: (await exists(layoutPath)) ? layoutPath : null,
      // doxygen falls back to its built-in layout
      required: false,
    };
  }

  const all = [doxygen, ...filters, ...(layoutFile ? [layoutFile] : [])];
  return {
    doxygen,
    filters,
    layout_file: layoutFile,
    ok: all.every((tool) => !tool.required || tool.found !== null),
  };
}

/**
 * Human-readable toolchain report.
 */
export function formatToolchainReport(report: ToolchainReport): string {
  const lines: string[] = [];
  const describe = (label: string, tool: ToolStatus): string => {
    let status = tool.found ?? (tool.required ? 'MISSING' : 'not found');
    if (tool.error) {
      status += ` (${tool.error.split('\n')[0]})`;
    }
    return `  ${label.padEnd(8)} ${tool.name}: ${status}`;
  };

  lines.push('Toolchain:');
  lines.push(describe('doxygen', report.doxygen));
  for (const filter of report.filters) {
    lines.push(describe('filter', filter));
  }
  if (report.layout_file) {
    lines.push(describe('layout', report.layout_file));
  }
  lines.push('');
  lines.push(report.ok ? 'All required tools found.' : 'Required tools are missing.');
  return lines.join('\n');
}
