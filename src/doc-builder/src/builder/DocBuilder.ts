/**
 * DocBuilder - Turn project settings plus command-line choices into a
 * doxygen run.
 *
 * doxygen is started in the base Doxyfile's directory, so every path placed
 * in the override block is made relative to that directory.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  BuildRequest,
  DoxygenSettings,
  OutputFormat,
  Override,
  ProjectSettings,
  RunResult,
} from '../types';
import {
  buildOverrides,
  loadDoxyfileEntries,
  parseDoxyfile,
  renderConfigStream,
  resolveSettings,
} from '../doxyfile';
import { DoxygenRunner } from '../runner';

/** Choices made on the command line; unset fields fall back to settings */
export interface BuildChoices {
  formats?: OutputFormat[];
  version?: string;
  doxyfile?: string;
  layoutFile?: string;
  excludePatterns?: string[];
  outputDirectory?: string;
  /** Directory command-line paths are relative to (default: process.cwd()) */
  cwd?: string;
}

export interface PreparedBuild {
  /** Absolute path of the base Doxyfile */
  doxyfile: string;
  /** Directory doxygen runs in */
  workingDir: string;
  request: BuildRequest;
  overrides: Override[];
  /** Full configuration text for `doxygen -` */
  stream: string;
}

export class DocBuilder {
  private runner: DoxygenRunner;

  constructor(
    private settings: ProjectSettings,
    runner?: DoxygenRunner
  ) {
    this.runner = runner ?? new DoxygenRunner({ binary: settings.doxygen });
  }

  /**
   * Read the base Doxyfile and assemble the configuration stream.
   */
  async prepare(choices: BuildChoices = {}): Promise<PreparedBuild> {
    const cwd = path.resolve(choices.cwd ?? process.cwd());
    const doxyfile = choices.doxyfile
      ? path.resolve(cwd, choices.doxyfile)
      : path.resolve(this.settings.base_dir, this.settings.doxyfile);
    const workingDir = path.dirname(doxyfile);

    const baseText = await fs.readFile(doxyfile, 'utf-8');
    // Fail on a malformed base file before doxygen sees it
    parseDoxyfile(baseText, doxyfile);

    const request = this.resolveRequest(choices, cwd, workingDir);
    const overrides = buildOverrides(request);

    return {
      doxyfile,
      workingDir,
      request,
      overrides,
      stream: renderConfigStream(baseText, overrides),
    };
  }

  /**
   * Run doxygen on a prepared stream.
   */
  async run(prepared: PreparedBuild): Promise<RunResult> {
    return this.runner.run(prepared.stream, prepared.workingDir);
  }

  /**
   * Prepare and run doxygen.
   */
  async build(choices: BuildChoices = {}): Promise<{ prepared: PreparedBuild; result: RunResult }> {
    const prepared = await this.prepare(choices);
    const result = await this.run(prepared);
    return { prepared, result };
  }

  /**
   * The configuration doxygen will end up with: the base Doxyfile, its
   * includes, then the override block.
   */
  async effectiveSettings(prepared: PreparedBuild): Promise<DoxygenSettings> {
    const entries = await loadDoxyfileEntries(prepared.doxyfile);
    for (const [key, values] of prepared.overrides) {
      entries.push({ key, operator: '=', values, line: 0 });
    }
    return resolveSettings(entries);
  }

  private resolveRequest(choices: BuildChoices, cwd: string, workingDir: string): BuildRequest {
    const relativeTo = (origin: string, file: string): string =>
      path.relative(workingDir, path.resolve(origin, file)) || '.';

    let layoutFile: string | undefined;
    if (choices.layoutFile) {
      layoutFile = relativeTo(cwd, choices.layoutFile);
    } else if (this.settings.layout_file) {
      layoutFile = relativeTo(this.settings.base_dir, this.settings.layout_file);
    }

    let outputDirectory: string | undefined;
    if (choices.outputDirectory) {
      outputDirectory = relativeTo(cwd, choices.outputDirectory);
    } else if (this.settings.output_directory) {
      outputDirectory = relativeTo(this.settings.base_dir, this.settings.output_directory);
    }

    const formats =
      choices.formats && choices.formats.length > 0 ? choices.formats : this.settings.formats;

    return {
      formats: [...formats],
      version: choices.version ?? this.settings.version,
      layoutFile,
      excludePatterns: [...this.settings.exclude_patterns, ...(choices.excludePatterns ?? [])],
      outputDirectory,
    };
  }
}
