import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';

// ── Public API ──────────────────────────────────────────────

export interface LoadConfigOptions {
  /** When true, a missing file yields the defaults instead of an error. */
  optional?: boolean;
}

/**
 * Load and validate a `.stepqa.yaml` (or JSON) config file.
 * Throws a ConfigurationError if the file is unreadable or invalid.
 */
export async function loadConfigFile(
  configPath: string,
  options: LoadConfigOptions = {},
): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (options.optional === true && isMissingFile(err)) {
      return fileConfigSchema.parse({});
    }
    throw new ConfigurationError(
      `Cannot read config file ${configPath}: ${errorMessage(err)}`,
    );
  }

  let parsed: unknown;
  try {
    parsed = configPath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    throw new ConfigurationError(
      `Cannot parse config file ${configPath}: ${errorMessage(err)}`,
    );
  }

  // An empty YAML document parses to null
  const result = fileConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid config file ${configPath}: ${issues}`);
  }

  return result.data;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
