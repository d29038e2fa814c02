/**
 * Core types for the doxygen documentation builder.
 *
 * A build is the base Doxyfile piped into `doxygen -` followed by a block of
 * override assignments derived from the command line and project config.
 */

// ============================================================================
// DOXYFILE GRAMMAR
// ============================================================================

/** Assignment operator in a Doxyfile line */
export type AssignmentOperator = '=' | '+=';

/** One logical assignment line of a Doxyfile */
export interface DoxyfileEntry {
  /** Option name, upper-cased (`@INCLUDE` keeps its prefix) */
  key: string;
  operator: AssignmentOperator;
  /** Whitespace-separated values with quotes removed */
  values: string[];
  /** 1-based physical line the assignment starts on */
  line: number;
}

/** Effective doxygen configuration after applying every assignment in order */
export type DoxygenSettings = Map<string, string[]>;

/** A single override appended to the configuration stream */
export type Override = [key: string, values: string[]];

// ============================================================================
// BUILD
// ============================================================================

/** Documentation output formats the builder can switch on */
export type OutputFormat = 'html' | 'rtf';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['html', 'rtf'];

/** Everything needed to derive the override block */
export interface BuildRequest {
  formats: OutputFormat[];
  /** Goes to PROJECT_NUMBER */
  version?: string;
  layoutFile?: string;
  excludePatterns: string[];
  outputDirectory?: string;
}

/** Outcome of a successful doxygen run */
export interface RunResult {
  exit_code: number;
  /** stderr lines doxygen reported as warnings */
  warnings: string[];
  duration_ms: number;
}

// ============================================================================
// PROJECT CONFIGURATION
// ============================================================================

/** Contents of docbuild.yml after defaults are applied */
export interface ProjectSettings {
  /** Base Doxyfile, relative to the config file's directory */
  doxyfile: string;
  layout_file?: string;
  exclude_patterns: string[];
  output_directory?: string;
  /** doxygen binary name or path */
  doxygen: string;
  formats: OutputFormat[];
  /** Version string for PROJECT_NUMBER */
  version?: string;
  /** Directory relative paths are resolved against */
  base_dir: string;
}

// ============================================================================
// TOOLCHAIN / SCAN REPORTS
// ============================================================================

export interface ToolStatus {
  name: string;
  /** Resolved path or version, null when not found */
  found: string | null;
  required: boolean;
  /** Why a tool that exists could not be used */
  error?: string;
}

export interface ToolchainReport {
  doxygen: ToolStatus;
  filters: ToolStatus[];
  layout_file?: ToolStatus;
  /** True when every required tool was found */
  ok: boolean;
}

export type HeaderIssueKind = 'missing-file-tag' | 'file-tag-mismatch';

export interface HeaderIssue {
  file: string;
  kind: HeaderIssueKind;
  /** Name given by the @file tag, for mismatches */
  tagged_as?: string;
}
