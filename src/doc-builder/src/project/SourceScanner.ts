/**
 * SourceScanner - List the files doxygen will read, and audit their headers.
 *
 * Mirrors doxygen's own input selection: INPUT entries expanded with
 * FILE_PATTERNS (recursively when RECURSIVE = YES), minus EXCLUDE paths and
 * EXCLUDE_PATTERNS wildcards matched against the absolute path.
 */

import * as fs from 'fs/promises';
import { Stats } from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import { DoxygenSettings, HeaderIssue } from '../types';
import { isEnabled } from '../doxyfile';

export const DEFAULT_FILE_PATTERNS = ['*.py'];

/** How far into a file the header tags are looked for */
export const HEADER_LINES = 40;

const FILE_TAG = /[@\\]file\s+(\S+)/;

/**
 * Convert a doxygen wildcard (`*`, `?`) to a RegExp over the whole path.
 * `*` crosses directory separators.
 */
export function wildcardToRegExp(pattern: string): RegExp {
  let source = '';
  for (const ch of pattern) {
    if (ch === '*') {
      source += '.*';
    } else if (ch === '?') {
      source += '.';
    } else {
      source += ch.replace(/[.+^${}()|[\]\\/]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`);
}

export function isExcluded(file: string, settings: DoxygenSettings, baseDir: string): boolean {
  const absolute = path.resolve(baseDir, file);

  for (const excluded of settings.get('EXCLUDE') ?? []) {
    const target = path.resolve(baseDir, excluded);
    if (absolute === target || absolute.startsWith(target + path.sep)) {
      return true;
    }
  }

  return (settings.get('EXCLUDE_PATTERNS') ?? []).some((pattern) =>
    wildcardToRegExp(pattern).test(absolute)
  );
}

/**
 * Absolute paths of the files doxygen would document, sorted.
 */
export async function scanSources(settings: DoxygenSettings, baseDir: string): Promise<string[]> {
  const inputs = settings.get('INPUT') ?? [];
  const roots = inputs.length > 0 ? inputs : ['.'];
  const filePatterns = settings.get('FILE_PATTERNS') ?? [];
  const patterns = filePatterns.length > 0 ? filePatterns : DEFAULT_FILE_PATTERNS;
  const recursive = isEnabled(settings, 'RECURSIVE');
  const found = new Set<string>();

  for (const root of roots) {
    const absoluteRoot = path.resolve(baseDir, root);
    let stat: Stats;
    try {
      stat = await fs.stat(absoluteRoot);
    } catch {
      // doxygen warns and skips missing inputs
      continue;
    }

    if (stat.isFile()) {
      found.add(absoluteRoot);
      continue;
    }

    const globs = patterns.map((p) => (recursive ? `**/${p}` : p));
    const matches = await glob(globs, { cwd: absoluteRoot, absolute: true, nodir: true });
    for (const match of matches) {
      found.add(path.resolve(match));
    }
  }

  return [...found].filter((file) => !isExcluded(file, settings, baseDir)).sort();
}

/**
 * Check each file carries an `@file` tag naming itself near the top.
 */
export async function auditHeaders(files: string[]): Promise<HeaderIssue[]> {
  const issues: HeaderIssue[] = [];

  for (const file of files) {
    const text = await fs.readFile(file, 'utf-8');
    const header = text.split(/\r?\n/).slice(0, HEADER_LINES).join('\n');
    const match = header.match(FILE_TAG);

    if (!match) {
      issues.push({ file, kind: 'missing-file-tag' });
      continue;
    }

    const tagged = match[1] ?? '';
    if (path.basename(tagged) !== path.basename(file)) {
      issues.push({ file, kind: 'file-tag-mismatch', tagged_as: tagged });
    }
  }

  return issues;
}

export function formatHeaderIssue(issue: HeaderIssue, baseDir: string): string {
  const relative = path.relative(baseDir, issue.file);
  if (issue.kind === 'missing-file-tag') {
    return `${relative}: missing @file tag`;
  }
  return `${relative}: @file names ${issue.tagged_as ?? '?'}`;
}
