import type { DependencyEdge, Specification } from '../../types/index.js';
import type { OutputPort } from '../ports/output.js';
import type { PromptPort } from '../ports/prompt.js';
import { NonInteractivePromptError } from '../ports/console-prompt.js';
import { findDependents, type PackageIndex } from '../index/installed-index.js';
import { getFullName } from '../specification.js';
import { DependentExistsError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export function formatDependentWarning(edge: DependencyEdge): string {
  const lines = [
    `${getFullName(edge.dependent)} depends on [${edge.requirement.name} (${edge.requirement.requirement})], ` +
    'which is satisfied by this package. This dependency is satisfied by:',
    ...edge.satisfiedBy.map(spec => `  ${getFullName(spec)}`)
  ];
  return lines.join('\n');
}

async function askToProceed(prompt: PromptPort): Promise<boolean> {
  try {
    return await prompt.confirm('Uninstall anyway?', false);
  } catch (error) {
    if (!(error instanceof NonInteractivePromptError)) {
      throw error;
    }
    logger.debug(error.message);
    return false;
  }
}

/**
 * Warn about each installed package that depends on `spec` and ask, per
 * dependent, whether to go ahead. Returns when there are no dependents or
 * every answer is yes.
 *
 * @throws DependentExistsError on the first declined dependent (a session
 *   that cannot prompt counts as declining)
 */
export async function confirmDependents(
  spec: Specification,
  index: PackageIndex,
  prompt: PromptPort,
  output: OutputPort
): Promise<void> {
  for (const edge of await findDependents(index, spec)) {
    output.warn(formatDependentWarning(edge));
    if (!(await askToProceed(prompt))) {
      throw new DependentExistsError(spec, edge.dependent);
    }
  }
}
