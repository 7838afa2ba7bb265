import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigurationError } from '@tenet/shared/src/utils/errors.js';
import { validateEvaluationConfig } from './validators.js';
import type { EvaluationConfig } from './evaluation-config.schema.js';

export interface AppConfig {
  readonly evaluation: EvaluationConfig;
}

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    throw new ConfigurationError(
      `Failed to read configuration file ${filePath}: ${nodeError.message}`,
    );
  }
}

export async function loadConfig(configDir: string): Promise<AppConfig> {
  const evaluationRaw = await readJsonFile(join(configDir, 'evaluation.json'));

  return { evaluation: validateEvaluationConfig(evaluationRaw) };
}
