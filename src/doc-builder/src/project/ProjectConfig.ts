/**
 * ProjectConfig - Load docbuild.yml and apply environment overrides.
 *
 * Precedence, highest first: command line, environment, config file, defaults.
 * Command-line values are applied by the CLI on top of what this returns.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { OutputFormat, OUTPUT_FORMATS, ProjectSettings } from '../types';
import { ConfigError, errnoCode, errorMessage } from '../errors';

export const DEFAULT_CONFIG_FILE = 'docbuild.yml';

/** Environment variables read by loadProjectConfig */
export const ENV_DOXYGEN = 'DOXYGEN';
export const ENV_VERSION = 'DOCBUILD_VERSION';

export interface LoadConfigOptions {
  /** Explicit config file; missing is an error */
  configFile?: string;
  /** Where to look for docbuild.yml when no file is given */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

const KNOWN_KEYS = new Set([
  'doxyfile',
  'layout_file',
  'exclude_patterns',
  'output_directory',
  'doxygen',
  'formats',
  'version',
]);

export function defaultSettings(baseDir: string): ProjectSettings {
  return {
    doxyfile: 'Doxyfile',
    exclude_patterns: [],
    doxygen: 'doxygen',
    formats: ['html'],
    base_dir: baseDir,
  };
}

/**
 * Load project settings. A missing default docbuild.yml yields defaults.
 */
export async function loadProjectConfig(options: LoadConfigOptions = {}): Promise<ProjectSettings> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const env = options.env ?? process.env;
  const file = options.configFile
    ? path.resolve(cwd, options.configFile)
    : path.join(cwd, DEFAULT_CONFIG_FILE);

  let text: string | null = null;
  try {
    text = await fs.readFile(file, 'utf-8');
  } catch (error) {
    const missing = errnoCode(error) === 'ENOENT';
    if (!missing || options.configFile) {
      throw new ConfigError(file, missing ? 'config file not found' : errorMessage(error));
    }
  }

  const settings =
    text === null ? defaultSettings(cwd) : parseProjectConfig(text, file, path.dirname(file));

  return applyEnvironment(settings, env);
}

/**
 * Validate YAML config text into settings.
 */
export function parseProjectConfig(text: string, source: string, baseDir: string): ProjectSettings {
  let raw: unknown;
  try {
    // Scalars stay strings: `version: 2.0` must not become 2
    raw = yaml.load(text, { schema: yaml.FAILSAFE_SCHEMA });
  } catch (error) {
    throw new ConfigError(source, errorMessage(error));
  }

  const settings = defaultSettings(baseDir);
  if (raw === undefined || raw === null) {
    return settings;
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError(source, 'expected a mapping at the top level');
  }

  for (const [key, value] of Object.entries(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new ConfigError(source, `unknown key "${key}"`);
    }

    switch (key) {
      case 'doxyfile':
        settings.doxyfile = expectString(source, key, value);
        break;
      case 'layout_file':
        settings.layout_file = expectString(source, key, value);
        break;
      case 'output_directory':
        settings.output_directory = expectString(source, key, value);
        break;
      case 'doxygen':
        settings.doxygen = expectString(source, key, value);
        break;
      case 'version':
        settings.version = expectString(source, key, value);
        break;
      case 'exclude_patterns':
        settings.exclude_patterns = expectStringList(source, key, value);
        break;
      case 'formats':
        settings.formats = parseFormats(source, expectStringList(source, key, value));
        break;
    }
  }

  return settings;
}

function applyEnvironment(settings: ProjectSettings, env: NodeJS.ProcessEnv): ProjectSettings {
  const result = { ...settings };
  const doxygen = env[ENV_DOXYGEN];
  if (doxygen) {
    result.doxygen = doxygen;
  }
  const version = env[ENV_VERSION];
  if (version) {
    result.version = version;
  }
  return result;
}

/**
 * Validate format names given on the command line or in config.
 */
export function parseFormats(source: string, names: string[]): OutputFormat[] {
  const formats: OutputFormat[] = [];
  for (const name of names) {
    const format = OUTPUT_FORMATS.find((f) => f === name.toLowerCase());
    if (!format) {
      throw new ConfigError(source, `unknown format "${name}" (expected ${OUTPUT_FORMATS.join(', ')})`);
    }
    if (!formats.includes(format)) {
      formats.push(format);
    }
  }
  return formats;
}

function expectString(source: string, key: string, value: unknown): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(source, `"${key}" must be a non-empty string`);
  }
  return value;
}

function expectStringList(source: string, key: string, value: unknown): string[] {
  if (typeof value === 'string') {
    return [value];
  }
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigError(source, `"${key}" must be a string or a list of strings`);
  }
  return value;
}
