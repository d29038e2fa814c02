/**
 * DoxyfileParser - Read and write doxygen's configuration grammar.
 *
 * Grammar handled:
 * - `KEY = values` replaces, `KEY += values` appends
 * - `#` comments anywhere outside double quotes
 * - trailing `\` continues a line
 * - double-quoted values with `\"` escapes
 * - `@INCLUDE` / `@INCLUDE_PATH` (followed by loadDoxyfile)
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { DoxyfileEntry, DoxygenSettings, AssignmentOperator } from '../types';
import { ConfigError, DoxyfileSyntaxError } from '../errors';

const ASSIGNMENT = /^(@?[A-Za-z_][A-Za-z0-9_]*)\s*(\+?=)(.*)$/;

export const INCLUDE_KEY = '@INCLUDE';
export const INCLUDE_PATH_KEY = '@INCLUDE_PATH';

/**
 * Parse Doxyfile text into assignments, in file order.
 */
export function parseDoxyfile(text: string, file: string = '<input>'): DoxyfileEntry[] {
  const entries: DoxyfileEntry[] = [];
  const physical = text.split(/\r?\n/);

  let logical = '';
  let startLine = 0;

  for (let i = 0; i < physical.length; i++) {
    const raw = physical[i] ?? '';
    if (logical === '') {
      startLine = i + 1;
    }

    const content = stripComment(raw).trimEnd();
    if (content.endsWith('\\')) {
      logical += content.slice(0, -1) + ' ';
      continue;
    }
    logical += content;

    const entry = parseLogicalLine(logical.trim(), file, startLine);
    if (entry) {
      entries.push(entry);
    }
    logical = '';
  }

  // Continuation on the last line
  const trailing = parseLogicalLine(logical.trim(), file, startLine);
  if (trailing) {
    entries.push(trailing);
  }

  return entries;
}

function parseLogicalLine(
  line: string,
  file: string,
  lineNumber: number
): DoxyfileEntry | null {
  if (line === '') return null;

  const match = line.match(ASSIGNMENT);
  if (!match) {
    throw new DoxyfileSyntaxError(file, lineNumber, `expected KEY = value, got "${line}"`);
  }

  const key = (match[1] ?? '').toUpperCase();
  const operator: AssignmentOperator = match[2] === '+=' ? '+=' : '=';
  const values = tokenizeValues(match[3] ?? '', file, lineNumber);

  return { key, operator, values, line: lineNumber };
}

/**
 * Remove a `#` comment, ignoring `#` inside double quotes.
 */
function stripComment(line: string): string {
  let inQuote = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuote && ch === '\\') {
      i++;
    } else if (ch === '"') {
      inQuote = !inQuote;
    } else if (ch === '#' && !inQuote) {
      return line.slice(0, i);
    }
  }
  return line;
}

/**
 * Split the right-hand side of an assignment into values.
 */
function tokenizeValues(rest: string, file: string, lineNumber: number): string[] {
  const values: string[] = [];
  let current = '';
  let hasToken = false;
  let inQuote = false;

  for (let i = 0; i < rest.length; i++) {
    const ch = rest[i] ?? '';

    if (inQuote) {
      if (ch === '\\' && rest[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        inQuote = false;
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuote = true;
      hasToken = true;
    } else if (/\s/.test(ch)) {
      if (hasToken) {
        values.push(current);
        current = '';
        hasToken = false;
      }
    } else {
      current += ch;
      hasToken = true;
    }
  }

  if (inQuote) {
    throw new DoxyfileSyntaxError(file, lineNumber, 'unterminated quoted value');
  }
  if (hasToken) {
    values.push(current);
  }

  return values;
}

/**
 * Apply assignments in order. `@` directives are skipped.
 */
export function resolveSettings(entries: DoxyfileEntry[]): DoxygenSettings {
  const settings: DoxygenSettings = new Map();

  for (const entry of entries) {
    if (entry.key.startsWith('@')) continue;

    if (entry.operator === '+=') {
      const existing = settings.get(entry.key) ?? [];
      settings.set(entry.key, [...existing, ...entry.values]);
    } else {
      settings.set(entry.key, [...entry.values]);
    }
  }

  return settings;
}

/**
 * Read a Doxyfile and every file it pulls in through `@INCLUDE`,
 * returning the assignments flattened in evaluation order.
 */
export async function loadDoxyfileEntries(
  filePath: string,
  chain: string[] = []
): Promise<DoxyfileEntry[]> {
  const absolute = path.resolve(filePath);
  const text = await fs.readFile(absolute, 'utf-8');
  const entries = parseDoxyfile(text, absolute);
  const dir = path.dirname(absolute);
  const includePaths: string[] = [];
  const flattened: DoxyfileEntry[] = [];

  for (const entry of entries) {
    if (entry.key === INCLUDE_PATH_KEY) {
      const dirs = entry.values.map((v) => path.resolve(dir, v));
      if (entry.operator === '=') {
        includePaths.length = 0;
      }
      includePaths.push(...dirs);
    } else if (entry.key === INCLUDE_KEY) {
      for (const name of entry.values) {
        const target = await findInclude(name, dir, includePaths);
        if (!target) {
          throw new DoxyfileSyntaxError(absolute, entry.line, `include file not found: ${name}`);
        }
        if (target === absolute || chain.includes(target)) {
          throw new DoxyfileSyntaxError(absolute, entry.line, `include cycle through ${target}`);
        }
        flattened.push(...(await loadDoxyfileEntries(target, [...chain, absolute])));
      }
    } else {
      flattened.push(entry);
    }
  }

  return flattened;
}

/**
 * Read a Doxyfile (with includes) into effective settings.
 */
export async function loadDoxyfile(filePath: string): Promise<DoxygenSettings> {
  return resolveSettings(await loadDoxyfileEntries(filePath));
}

async function findInclude(
  name: string,
  dir: string,
  includePaths: string[]
): Promise<string | null> {
  const candidates = path.isAbsolute(name)
    ? [name]
    : [path.join(dir, name), ...includePaths.map((p) => path.join(p, name))];

  for (const candidate of candidates) {
    try {
      await fs.access(candidate);
      return path.resolve(candidate);
    } catch {
      // try next
    }
  }
  return null;
}

// ============================================================================
// Writing
// ============================================================================

/**
 * Quote a value when doxygen would otherwise split or truncate it.
 */
export function formatValue(value: string): string {
  if (value === '') return '""';
  if (/[\s#"]/.test(value)) {
    return `"${value.replace(/"/g, '\\"')}"`;
  }
  return value;
}

const CONTROL_CHARACTER = /[\x00-\x08\x0a-\x1f\x7f]/;

/**
 * Render one assignment line.
 *
 * @throws ConfigError for a value containing a line break or other control
 *   character, or ending in a backslash. doxygen would read either as the
 *   start of another line, quoted or not.
 */
export function formatAssignment(key: string, values: string[]): string {
  for (const value of values) {
    if (CONTROL_CHARACTER.test(value)) {
      throw new ConfigError(key, `value ${JSON.stringify(value)} contains a control character`);
    }
    if (value.endsWith('\\')) {
      throw new ConfigError(key, `value ${JSON.stringify(value)} ends in a backslash`);
    }
  }
  if (values.length === 0) return `${key} =`;
  return `${key} = ${values.map(formatValue).join(' ')}`;
}

/**
 * Read a boolean option the way doxygen does (YES/NO, case-insensitive).
 */
export function isEnabled(settings: DoxygenSettings, key: string): boolean {
  const value = settings.get(key)?.[0];
  return value !== undefined && value.toUpperCase() === 'YES';
}
