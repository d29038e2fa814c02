export {
  loadProjectConfig,
  parseProjectConfig,
  parseFormats,
  defaultSettings,
  DEFAULT_CONFIG_FILE,
  ENV_DOXYGEN,
  ENV_VERSION,
  LoadConfigOptions,
} from './ProjectConfig';

export {
  scanSources,
  auditHeaders,
  isExcluded,
  wildcardToRegExp,
  formatHeaderIssue,
  DEFAULT_FILE_PATTERNS,
  HEADER_LINES,
} from './SourceScanner';
