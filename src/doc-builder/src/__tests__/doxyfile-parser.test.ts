/**
 * Tests for the Doxyfile reader/writer.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  parseDoxyfile,
  resolveSettings,
  loadDoxyfile,
  formatValue,
  formatAssignment,
  isEnabled,
} from '../doxyfile';
import { ConfigError, DoxyfileSyntaxError } from '../errors';

const TEST_DIR = '/tmp/doc-builder-doxyfile-test';

beforeAll(async () => {
  await fs.rm(TEST_DIR, { recursive: true, force: true });
  await fs.mkdir(path.join(TEST_DIR, 'shared'), { recursive: true });
});

afterAll(async () => {
  await fs.rm(TEST_DIR, { recursive: true, force: true });
});

describe('parseDoxyfile', () => {
  const sample = [
    '# Project',
    'PROJECT_NAME = "Test Automation Framework"',
    'INPUT = taf \\',
    '        unittests',
    'FILE_PATTERNS = *.py',
    'FILE_PATTERNS += *.md   # docs',
    'FILTER_PATTERNS = "*.py=python doxypy.py"',
    'project_brief = "say \\"hi\\" # not a comment"',
    '',
  ].join('\n');

  test('should parse assignments in order with their line numbers', () => {
    const entries = parseDoxyfile(sample);

    expect(entries.map((e) => [e.key, e.operator, e.line])).toEqual([
      ['PROJECT_NAME', '=', 2],
      ['INPUT', '=', 3],
      ['FILE_PATTERNS', '=', 5],
      ['FILE_PATTERNS', '+=', 6],
      ['FILTER_PATTERNS', '=', 7],
      ['PROJECT_BRIEF', '=', 8],
    ]);
  });

  test('should split values and keep quoted whitespace', () => {
    const entries = parseDoxyfile(sample);

    expect(entries[0]?.values).toEqual(['Test Automation Framework']);
    expect(entries[1]?.values).toEqual(['taf', 'unittests']);
    expect(entries[4]?.values).toEqual(['*.py=python doxypy.py']);
  });

  test('should keep # and escaped quotes inside quoted values', () => {
    const entries = parseDoxyfile(sample);
    expect(entries[5]?.values).toEqual(['say "hi" # not a comment']);
  });

  test('should read empty assignments', () => {
    const entries = parseDoxyfile('EXCLUDE =\nPROJECT_NUMBER = ""\n');
    expect(entries[0]?.values).toEqual([]);
    expect(entries[1]?.values).toEqual(['']);
  });

  test('should keep @INCLUDE directives as entries', () => {
    const entries = parseDoxyfile('@INCLUDE = base.cfg\n');
    expect(entries[0]).toEqual({ key: '@INCLUDE', operator: '=', values: ['base.cfg'], line: 1 });
  });

  test('should reject a line that is not an assignment', () => {
    expect(() => parseDoxyfile('PROJECT_NAME = x\nGENERATE_HTML YES\n', 'Doxyfile')).toThrow(
      'Doxyfile:2: expected KEY = value, got "GENERATE_HTML YES"'
    );
  });

  test('should reject an unterminated quote', () => {
    expect(() => parseDoxyfile('PROJECT_NAME = "abc')).toThrow(DoxyfileSyntaxError);
    expect(() => parseDoxyfile('PROJECT_NAME = "abc')).toThrow('<input>:1: unterminated quoted value');
  });
});

describe('resolveSettings', () => {
  test('should replace on = and append on +=', () => {
    const settings = resolveSettings(
      parseDoxyfile('FILE_PATTERNS = *.py\nFILE_PATTERNS += *.md\nGENERATE_HTML = NO\nGENERATE_HTML = YES\n')
    );

    expect(settings.get('FILE_PATTERNS')).toEqual(['*.py', '*.md']);
    expect(settings.get('GENERATE_HTML')).toEqual(['YES']);
  });

  test('should ignore @ directives', () => {
    const settings = resolveSettings(parseDoxyfile('@INCLUDE = base.cfg\nINPUT = taf\n'));
    expect([...settings.keys()]).toEqual(['INPUT']);
  });

  test('isEnabled should read YES case-insensitively', () => {
    const settings = resolveSettings(parseDoxyfile('RECURSIVE = yes\nGENERATE_LATEX = NO\n'));
    expect(isEnabled(settings, 'RECURSIVE')).toBe(true);
    expect(isEnabled(settings, 'GENERATE_LATEX')).toBe(false);
    expect(isEnabled(settings, 'GENERATE_RTF')).toBe(false);
  });
});

describe('loadDoxyfile', () => {
  test('should inline @INCLUDE files relative to the includer', async () => {
    await fs.writeFile(path.join(TEST_DIR, 'common.cfg'), 'GENERATE_LATEX = NO\nINPUT = src\n');
    await fs.writeFile(path.join(TEST_DIR, 'Doxyfile'), '@INCLUDE = common.cfg\nINPUT += lib\n');

    const settings = await loadDoxyfile(path.join(TEST_DIR, 'Doxyfile'));

    expect(settings.get('GENERATE_LATEX')).toEqual(['NO']);
    expect(settings.get('INPUT')).toEqual(['src', 'lib']);
  });

  test('should search @INCLUDE_PATH directories', async () => {
    await fs.writeFile(path.join(TEST_DIR, 'shared', 'base.cfg'), 'PROJECT_NAME = TAF\n');
    await fs.writeFile(
      path.join(TEST_DIR, 'WithPath'),
      '@INCLUDE_PATH = shared\n@INCLUDE = base.cfg\n'
    );

    const settings = await loadDoxyfile(path.join(TEST_DIR, 'WithPath'));
    expect(settings.get('PROJECT_NAME')).toEqual(['TAF']);
  });

  test('should report a missing include with its line', async () => {
    await fs.writeFile(path.join(TEST_DIR, 'Broken'), 'INPUT = src\n@INCLUDE = nope.cfg\n');

    await expect(loadDoxyfile(path.join(TEST_DIR, 'Broken'))).rejects.toThrow(
      `${path.join(TEST_DIR, 'Broken')}:2: include file not found: nope.cfg`
    );
  });

  test('should detect include cycles', async () => {
    await fs.writeFile(path.join(TEST_DIR, 'a.cfg'), '@INCLUDE = b.cfg\n');
    await fs.writeFile(path.join(TEST_DIR, 'b.cfg'), '@INCLUDE = a.cfg\n');

    await expect(loadDoxyfile(path.join(TEST_DIR, 'a.cfg'))).rejects.toThrow('include cycle');
  });
});

describe('formatting', () => {
  test('formatValue should quote only when needed', () => {
    expect(formatValue('YES')).toBe('YES');
    expect(formatValue('*/unittests/*')).toBe('*/unittests/*');
    expect(formatValue('My Project')).toBe('"My Project"');
    expect(formatValue('a"b')).toBe('"a\\"b"');
    expect(formatValue('')).toBe('""');
  });

  test('formatAssignment should join values', () => {
    expect(formatAssignment('EXCLUDE_PATTERNS', ['*/unittests/*', '*/conftest.py'])).toBe(
      'EXCLUDE_PATTERNS = */unittests/* */conftest.py'
    );
    expect(formatAssignment('EXCLUDE', [])).toBe('EXCLUDE =');
  });

  test('formatted values should parse back to the same values', () => {
    const values = ['Release 2.0', 'say "hi"', '#1', 'tab\there', 'C:\\docs\\out', 'plain'];
    const entries = parseDoxyfile(formatAssignment('PROJECT_BRIEF', values));
    expect(entries[0]?.values).toEqual(values);
  });

  test('formatAssignment should reject line breaks in a value', () => {
    expect(() => formatAssignment('PROJECT_NUMBER', ['1.0\nGENERATE_LATEX = YES'])).toThrow(ConfigError);
    expect(() => formatAssignment('PROJECT_NUMBER', ['1.0\r'])).toThrow(
      'PROJECT_NUMBER: value "1.0\\r" contains a control character'
    );
  });

  test('formatAssignment should reject a trailing backslash', () => {
    expect(() => formatAssignment('PROJECT_NUMBER', ['1.0\\'])).toThrow(
      'PROJECT_NUMBER: value "1.0\\\\" ends in a backslash'
    );
  });
});
