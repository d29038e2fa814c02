/**
 * ConfigStream - Build the configuration doxygen reads from stdin.
 *
 * The stream is the base Doxyfile unchanged, followed by override
 * assignments. doxygen applies assignments in order, so the appended
 * block wins over anything the base file sets.
 */

import { BuildRequest, Override, OutputFormat } from '../types';
import { formatAssignment } from './DoxyfileParser';

/** Used when a request names no format */
export const DEFAULT_FORMATS: OutputFormat[] = ['html'];

const yesNo = (flag: boolean): string => (flag ? 'YES' : 'NO');

/**
 * Derive the override block for a build request, in stream order.
 */
export function buildOverrides(request: BuildRequest): Override[] {
  const formats = request.formats.length > 0 ? request.formats : DEFAULT_FORMATS;
  const html = formats.includes('html');
  const rtf = formats.includes('rtf');
  const overrides: Override[] = [];

  if (request.layoutFile) {
    overrides.push(['LAYOUT_FILE', [request.layoutFile]]);
  }

  overrides.push(['GENERATE_HTML', [yesNo(html)]]);
  overrides.push(['GENERATE_RTF', [yesNo(rtf)]]);

  if (rtf) {
    overrides.push(['RTF_HYPERLINKS', ['YES']]);
  }

  if (request.excludePatterns.length > 0) {
    overrides.push(['EXCLUDE_PATTERNS', [...request.excludePatterns]]);
  }

  if (request.version) {
    overrides.push(['PROJECT_NUMBER', [request.version]]);
  }

  if (request.outputDirectory) {
    overrides.push(['OUTPUT_DIRECTORY', [request.outputDirectory]]);
  }

  return overrides;
}

/**
 * Concatenate the base configuration and the override lines.
 */
export function renderConfigStream(baseText: string, overrides: Override[]): string {
  const lines: string[] = [];
  if (baseText.length > 0) {
    lines.push(baseText.endsWith('\n') ? baseText : `${baseText}\n`);
  }
  for (const [key, values] of overrides) {
    lines.push(`${formatAssignment(key, values)}\n`);
  }
  return lines.join('');
}
