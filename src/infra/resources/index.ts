/**
 * Embedded resources for slugwright
 *
 * Resources are organized into:
 * - resources/characters/strippable.yaml        - Non-word codepoint ranges
 * - resources/characters/approximations/*.yaml  - Built-in approximation tables
 */

import { readFileSync, readdirSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import {
  ApproximationFileSchema,
  StrippableFileSchema,
  type ApproximationFile,
  type StrippableFile,
} from '../../core/models/index.js';
import { formatIssues } from '../../shared/utils/error.js';

/**
 * Get the resources directory path
 * Supports both development (src/) and production (dist/) environments
 */
export function getResourcesDir(): string {
  const currentDir = dirname(fileURLToPath(import.meta.url));
  // From src/infra/resources or dist/infra/resources, go up to project root then into resources/
  return join(currentDir, '..', '..', '..', 'resources');
}

export function getCharactersResourcesDir(): string {
  return join(getResourcesDir(), 'characters');
}

function readYamlResource(path: string): unknown {
  return parseYaml(readFileSync(path, 'utf-8'));
}

/**
 * Load and validate the strippable codepoint ranges.
 */
export function loadStrippableFile(): StrippableFile {
  const path = join(getCharactersResourcesDir(), 'strippable.yaml');
  const result = StrippableFileSchema.safeParse(readYamlResource(path));
  if (!result.success) {
    throw new Error(`Invalid character resource ${path}:\n${formatIssues(result.error.issues)}`);
  }
  return result.data;
}

/**
 * Load and validate every built-in approximation table, sorted by file name.
 */
export function loadApproximationFiles(): ApproximationFile[] {
  const dir = join(getCharactersResourcesDir(), 'approximations');
  if (!existsSync(dir)) {
    return [];
  }

  return readdirSync(dir)
    .filter((entry) => entry.endsWith('.yaml'))
    .sort()
    .map((entry) => {
      const path = join(dir, entry);
      const result = ApproximationFileSchema.safeParse(readYamlResource(path));
      if (!result.success) {
        throw new Error(`Invalid approximation resource ${path}:\n${formatIssues(result.error.issues)}`);
      }
      return result.data;
    });
}
