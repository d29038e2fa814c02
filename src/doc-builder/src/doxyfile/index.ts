/**
 * Doxyfile grammar and configuration stream assembly.
 */

export {
  parseDoxyfile,
  resolveSettings,
  loadDoxyfile,
  loadDoxyfileEntries,
  formatValue,
  formatAssignment,
  isEnabled,
  INCLUDE_KEY,
  INCLUDE_PATH_KEY,
} from './DoxyfileParser';

export { buildOverrides, renderConfigStream, DEFAULT_FORMATS } from './ConfigStream';
