/**
 * Command definitions for generate-docs.
 *
 * Commands:
 *   (default)   Generate documentation with doxygen
 *   check       Verify doxygen and its input filters are installed
 *   scan        List the sources doxygen will document
 */

import { Command } from 'commander';
import * as path from 'path';
import { OutputFormat } from '../types';
import { errorMessage } from '../errors';
import { loadProjectConfig, scanSources, auditHeaders, formatHeaderIssue } from '../project';
import { DoxygenRunner, checkToolchain, formatToolchainReport } from '../runner';
import { DocBuilder } from '../builder';

interface CommonOptions {
  config?: string;
  doxyfile?: string;
  verbose?: boolean;
}

interface GenerateOptions extends CommonOptions {
  html?: boolean;
  rtf?: boolean;
  version?: string;
  layout?: string;
  exclude?: string[];
  outputDir?: string;
  dryRun?: boolean;
}

interface ScanOptions extends CommonOptions {
  audit?: boolean;
  json?: boolean;
}

interface CheckOptions extends CommonOptions {
  json?: boolean;
}

function verboseLog(enabled: boolean | undefined): (line: string) => void {
  return enabled ? (line) => console.error(line) : () => undefined;
}

function fail(context: string, error: unknown): void {
  console.error(`${context} failed: ${errorMessage(error)}`);
  process.exitCode = 1;
}

function requestedFormats(options: GenerateOptions): OutputFormat[] {
  const formats: OutputFormat[] = [];
  if (options.html) formats.push('html');
  if (options.rtf) formats.push('rtf');
  return formats;
}

/**
 * Load settings and create a builder whose runner logs under --verbose.
 */
async function createBuilder(options: CommonOptions): Promise<{ builder: DocBuilder; runner: DoxygenRunner }> {
  const settings = await loadProjectConfig({ configFile: options.config });
  const runner = new DoxygenRunner({
    binary: settings.doxygen,
    log: verboseLog(options.verbose),
  });
  return { builder: new DocBuilder(settings, runner), runner };
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('generate-docs')
    .description('Generate HTML/RTF documentation with doxygen')
    // program options only before a subcommand, so check/scan keep their own --config
    .enablePositionalOptions()
    .option('--html', 'Generate HTML output')
    .option('--rtf', 'Generate RTF output')
    .option('--version <string>', 'Version string written to PROJECT_NUMBER')
    .option('-c, --config <file>', 'Project config file (default: docbuild.yml)')
    .option('--doxyfile <file>', 'Base doxygen configuration file')
    .option('--layout <file>', 'doxygen layout file')
    .option('--exclude <patterns...>', 'Additional EXCLUDE_PATTERNS wildcards')
    .option('-o, --output-dir <dir>', 'doxygen OUTPUT_DIRECTORY')
    .option('--dry-run', 'Print the configuration stream instead of running doxygen')
    .option('--verbose', 'Verbose output')
    .action(async (options: GenerateOptions) => {
      try {
        const log = verboseLog(options.verbose);
        const { builder } = await createBuilder(options);

        const prepared = await builder.prepare({
          formats: requestedFormats(options),
          version: options.version,
          doxyfile: options.doxyfile,
          layoutFile: options.layout,
          excludePatterns: options.exclude,
          outputDirectory: options.outputDir,
        });

        if (options.dryRun) {
          process.stdout.write(prepared.stream);
          return;
        }

        log(`Doxyfile: ${prepared.doxyfile}`);
        log(`Formats: ${prepared.request.formats.join(', ')}`);
        if (prepared.request.version) {
          log(`Version: ${prepared.request.version}`);
        }

        const result = await builder.run(prepared);

        console.log(
          `Documentation generated in ${prepared.workingDir} ` +
            `(${result.duration_ms}ms, ${result.warnings.length} warnings)`
        );
        if (options.verbose) {
          for (const warning of result.warnings) {
            console.error(warning);
          }
        }
      } catch (error) {
        fail('Documentation build', error);
      }
    });

  program
    .command('check')
    .description('Check that doxygen and its input filters are installed')
    .option('-c, --config <file>', 'Project config file (default: docbuild.yml)')
    .option('--doxyfile <file>', 'Base doxygen configuration file')
    .option('--json', 'Output as JSON')
    .option('--verbose', 'Verbose output')
    .action(async (options: CheckOptions) => {
      try {
        const { builder, runner } = await createBuilder(options);
        const prepared = await builder.prepare({ doxyfile: options.doxyfile });
        const settings = await builder.effectiveSettings(prepared);
        const report = await checkToolchain(settings, { runner, baseDir: prepared.workingDir });

        if (options.json) {
          console.log(JSON.stringify(report, null, 2));
        } else {
          console.log(formatToolchainReport(report));
        }

        if (!report.ok) {
          process.exitCode = 1;
        }
      } catch (error) {
        fail('Toolchain check', error);
      }
    });

  program
    .command('scan')
    .description('List the source files doxygen will document')
    .option('-c, --config <file>', 'Project config file (default: docbuild.yml)')
    .option('--doxyfile <file>', 'Base doxygen configuration file')
    .option('--audit', 'Report files without a matching @file header tag')
    .option('--json', 'Output as JSON')
    .option('--verbose', 'Verbose output')
    .action(async (options: ScanOptions) => {
      try {
        const log = verboseLog(options.verbose);
        const { builder } = await createBuilder(options);
        const prepared = await builder.prepare({ doxyfile: options.doxyfile });
        const settings = await builder.effectiveSettings(prepared);
        const files = await scanSources(settings, prepared.workingDir);
        const issues = options.audit ? await auditHeaders(files) : [];

        log(`Scanned from ${prepared.workingDir}`);

        if (options.json) {
          const relative = (file: string) => path.relative(prepared.workingDir, file);
          console.log(
            JSON.stringify(
              {
                files: files.map(relative),
                ...(options.audit
                  ? { issues: issues.map((i) => ({ ...i, file: relative(i.file) })) }
                  : {}),
              },
              null,
              2
            )
          );
        } else {
          for (const file of files) {
            console.log(path.relative(prepared.workingDir, file));
          }
          if (options.audit) {
            console.log('');
            for (const issue of issues) {
              console.log(formatHeaderIssue(issue, prepared.workingDir));
            }
            console.log(`${issues.length} header issues in ${files.length} files`);
          }
        }

        if (issues.length > 0) {
          process.exitCode = 1;
        }
      } catch (error) {
        fail('Source scan', error);
      }
    });

  return program;
}
