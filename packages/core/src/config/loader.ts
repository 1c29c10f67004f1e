import { promises as fs } from 'node:fs';
import YAML from 'yaml';
import { ValidationError } from '../errors.js';
import { getConfigPath } from '../utils/paths.js';
import { logger } from '../utils/logger.js';
import { compileRules } from '../status/rules.js';
import type { ClassifierOptions } from '../status/classifier.js';
import { PanewardConfigSchema } from './types.js';
import type { PanewardConfig, PanewardConfigInput } from './types.js';

/**
 * Validates raw config data, applying defaults for missing keys.
 *
 * @throws {ValidationError} listing every failing path
 */
export function parseConfig(data: unknown, source: string = 'config'): PanewardConfig {
  const result = PanewardConfigSchema.safeParse(data ?? {});
  if (!result.success) {
    const details = result.error.issues.map((issue) => ({
      path: issue.path.join('.') || '/',
      message: issue.message,
    }));
    const paths = details.map((d) => `${d.path}: ${d.message}`).join('; ');
    throw new ValidationError(`Invalid ${source}: ${paths}`, source, details);
  }
  return result.data;
}

/**
 * Loads ~/.paneward/config.yaml (or `configPath`), merging `overrides` on top.
 * A missing file yields the defaults.
 *
 * @throws {ValidationError} on malformed YAML or invalid values
 */
export async function loadConfig(
  overrides: PanewardConfigInput = {},
  configPath: string = getConfigPath(),
): Promise<PanewardConfig> {
  let raw: unknown = {};
  try {
    const content = await fs.readFile(configPath, 'utf-8');
    raw = YAML.parse(content) ?? {};
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      logger.debug(`No config at ${configPath}, using defaults`);
    } else {
      throw new ValidationError(
        `Could not read ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
        configPath,
      );
    }
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ValidationError(`${configPath} must contain a mapping`, configPath);
  }

  return parseConfig({ ...raw, ...overrides }, configPath);
}

/** Compiles the classifier tunables out of a validated config. */
export function classifierOptionsFrom(config: PanewardConfig): ClassifierOptions {
  return {
    debounceMs: config.debounceMs,
    promptWindowLines: config.promptWindowLines,
    promptRules: compileRules(config.promptPatterns, 'promptPatterns'),
    activityRules: compileRules(config.activityPatterns, 'activityPatterns'),
  };
}
