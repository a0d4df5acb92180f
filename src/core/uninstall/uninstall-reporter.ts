import type { Specification } from '../../types/index.js';
import type { OutputPort } from '../ports/output.js';
import { resolveOutput } from '../ports/resolve.js';
import { formatPathForDisplay } from '../../utils/formatters.js';

export interface UninstallReportData {
  specification: Specification;
  removedPaths: string[];
  regeneratedStubs: string[];
}

function formatPathList(paths: readonly string[]): string {
  const display = [...paths].sort((a, b) => a.localeCompare(b)).map(p => formatPathForDisplay(p));
  return display.slice(0, 3).join('\n') +
    (display.length > 3 ? `\n... and ${display.length - 3} more` : '');
}

/**
 * Report the outcome of removing one installed version
 */
export function reportUninstallResult(data: UninstallReportData, output: OutputPort = resolveOutput()): void {
  output.success(`Successfully uninstalled ${data.specification.name} version ${data.specification.version}`);

  if (data.removedPaths.length > 0) {
    output.note(formatPathList(data.removedPaths), 'Removed');
  }
  if (data.regeneratedStubs.length > 0) {
    output.note(formatPathList(data.regeneratedStubs), 'Regenerated');
  }
}
