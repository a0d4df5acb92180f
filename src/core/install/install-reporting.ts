import type { Specification } from '../../types/index.js';
import type { OutputPort } from '../ports/output.js';
import type { ExtensionBuildResult } from './extension-builder.js';
import { resolveOutput } from '../ports/resolve.js';
import { formatFileCount, formatPathForDisplay, formatTreeList } from '../../utils/formatters.js';

/**
 * Data required to render the install report.
 */
export interface InstallReportData {
  specification: Specification;
  extractedFiles: string[];
  launchers: string[];
  libraryStubs: string[];
  extensionResults: ExtensionBuildResult[];
  /** Null when a same-named archive was already cached */
  cachedArchive: string | null;
}

export function displayInstallationResults(data: InstallReportData, output: OutputPort = resolveOutput()): void {
  const { specification, extractedFiles, launchers, libraryStubs, extensionResults, cachedArchive } = data;

  output.success(`Successfully installed ${specification.name} version ${specification.version}`);
  output.info(`  ${formatFileCount(extractedFiles.length)} extracted`);

  if (launchers.length > 0) {
    output.info('  Executables:');
    for (const line of formatTreeList(launchers.map(p => formatPathForDisplay(p)), '    ')) {
      output.info(line);
    }
  }

  if (libraryStubs.length > 0) {
    output.info('  Library stubs:');
    for (const line of formatTreeList(libraryStubs.map(p => formatPathForDisplay(p)), '    ')) {
      output.info(line);
    }
  }

  const failed = extensionResults.filter(r => !r.success);
  if (extensionResults.length > 0) {
    output.info(`  Extensions: ${extensionResults.length - failed.length} built, ${failed.length} failed`);
  }

  if (cachedArchive) {
    output.info(`  Cached archive: ${formatPathForDisplay(cachedArchive)}`);
  }
}
