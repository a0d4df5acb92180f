import { join } from 'path';

import type { DependencyEdge, PackageDependency, Specification } from '../../types/index.js';
import { ANY_VERSION, FILE_PATTERNS } from '../../constants/index.js';
import { InvalidPackageError } from '../../utils/errors.js';
import { listFiles } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { satisfiesRequirement } from '../../utils/validation/version.js';
import { getInstallLayout } from '../directory.js';
import { isSameSpecification, readSpecificationFile, sortSpecifications } from '../specification.js';

/**
 * Package Index Port
 *
 * Lookup of the specifications installed under one install root.
 * The pipelines only ask two questions of it: what is installed, and which
 * installed versions of a name satisfy a requirement.
 */
export interface PackageIndex {
  /** Every installed specification, sorted by name then version */
  list(): Promise<Specification[]>;

  /** Installed specifications named `name` satisfying `requirement`, ascending by version */
  search(name: string, requirement?: string): Promise<Specification[]>;
}

/**
 * Index over the descriptor files in `<installDir>/specifications`.
 *
 * Nothing is cached: every query re-reads the directory, so results reflect
 * removals made earlier in the same run.
 */
export class InstalledPackageIndex implements PackageIndex {
  private readonly installDir: string;

  constructor(installDir: string) {
    this.installDir = installDir;
  }

  async list(): Promise<Specification[]> {
    const { specifications } = getInstallLayout(this.installDir);
    const descriptorFiles = (await listFiles(specifications))
      .filter(file => file.endsWith(FILE_PATTERNS.DESCRIPTOR_EXT));

    const specs: Specification[] = [];
    for (const file of descriptorFiles) {
      const descriptorPath = join(specifications, file);
      try {
        specs.push(await readSpecificationFile(descriptorPath, this.installDir));
      } catch (error) {
        if (!(error instanceof InvalidPackageError)) {
          throw error;
        }
        logger.warn(`Skipping unreadable descriptor ${descriptorPath}`, { error: error.message });
      }
    }

    return sortSpecifications(specs);
  }

  async search(name: string, requirement: string = ANY_VERSION): Promise<Specification[]> {
    const all = await this.list();
    return all.filter(spec => spec.name === name && satisfiesRequirement(spec.version, requirement));
  }
}

/**
 * Whether an installed package satisfies a dependency
 */
export async function isDependencySatisfied(index: PackageIndex, dependency: PackageDependency): Promise<boolean> {
  const matches = await index.search(dependency.name, dependency.requirement);
  return matches.length > 0;
}

/**
 * Installed packages whose dependencies `spec` satisfies, each with every
 * installed specification that satisfies the same requirement.
 */
export async function findDependents(index: PackageIndex, spec: Specification): Promise<DependencyEdge[]> {
  const installed = await index.list();
  const edges: DependencyEdge[] = [];

  for (const candidate of installed) {
    if (isSameSpecification(candidate, spec)) {
      continue;
    }
    for (const requirement of candidate.dependencies) {
      if (requirement.name !== spec.name || !satisfiesRequirement(spec.version, requirement.requirement)) {
        continue;
      }
      edges.push({
        dependent: candidate,
        requirement,
        satisfiedBy: installed.filter(
          s => s.name === requirement.name && satisfiesRequirement(s.version, requirement.requirement)
        )
      });
    }
  }

  return edges;
}
