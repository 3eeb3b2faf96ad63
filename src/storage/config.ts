/**
 * Project Config Storage
 *
 * Project configuration stored at <root>/.repro/config.json.
 *
 * @module storage/config
 */

import * as fs from 'node:fs/promises';
import { ConfigurationError } from '../pipeline/errors.js';
import {
  DEFAULT_PROJECT_CONFIG,
  ProjectConfigSchema,
  type ProjectConfig,
} from '../schemas/project-config.js';
import { formatIssues } from '../schemas/common.js';
import { atomicWriteJson } from './atomic.js';
import { getProjectConfigPath } from './paths.js';

/**
 * Save project config to disk
 *
 * @param root - Project root
 * @param config - The project config to save
 */
export async function saveProjectConfig(root: string, config: ProjectConfig): Promise<void> {
  const validated = ProjectConfigSchema.parse(config);
  await atomicWriteJson(getProjectConfigPath(root), validated);
}

/**
 * Load project config from disk
 *
 * Returns default config if file doesn't exist.
 *
 * @param root - Project root
 * @returns The project config
 * @throws ConfigurationError if config file exists but is invalid
 */
export async function loadProjectConfig(root: string): Promise<ProjectConfig> {
  const filePath = getProjectConfigPath(root);

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return DEFAULT_PROJECT_CONFIG;
    }
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in ${filePath}`, { cause: error });
  }

  const result = ProjectConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid project config ${filePath}: ${formatIssues(result.error).join('; ')}`
    );
  }
  return result.data;
}
