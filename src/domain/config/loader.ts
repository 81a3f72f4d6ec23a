import { join } from 'node:path';
import { readFileOrNull } from '../../infra/fs-utils.js';
import { ValidationError, errorMessage } from '../../infra/errors.js';
import { validate, type Schema } from '../../infra/validator.js';
import { isLogLevel } from '../../logging/logger.js';
import { CONFIG_FILE } from '../../constants.js';
import type { PluginConfig, ResolvedConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

const configSchema: Schema = {
  logging: {
    type: 'object',
    required: false,
    fields: {
      level: {
        type: 'custom',
        required: false,
        check: (v) => (isLogLevel(v) ? null : 'must be one of: debug, info, warn, error'),
      },
    },
  },
  registry: {
    type: 'object',
    required: false,
    fields: { firstInstanceId: { type: 'number', required: false, integer: true, min: 0 } },
  },
  documents: {
    type: 'object',
    required: false,
    fields: { indent: { type: 'number', required: false, integer: true, min: 0, max: 10 } },
  },
};

/** Layers a partial config over the defaults, section by section. */
export function resolveConfig(override?: PluginConfig): ResolvedConfig {
  return {
    logging: { ...DEFAULT_CONFIG.logging, ...override?.logging },
    registry: { ...DEFAULT_CONFIG.registry, ...override?.registry },
    documents: { ...DEFAULT_CONFIG.documents, ...override?.documents },
  };
}

export class ConfigLoader {
  /**
   * Reads `enum-editor.json` from `dir`. A missing file yields the defaults;
   * invalid JSON or out-of-range values throw ValidationError.
   */
  async load(dir: string): Promise<ResolvedConfig> {
    const configPath = join(dir, CONFIG_FILE);
    const raw = await readFileOrNull(configPath);
    if (raw === null) return resolveConfig();

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new ValidationError(`Invalid JSON in config file: ${configPath}`, [errorMessage(e)]);
    }

    const errors = validate(parsed, configSchema);
    if (errors.length > 0) {
      throw new ValidationError(`Invalid config file: ${configPath}`, errors);
    }
    return resolveConfig(parsed as PluginConfig);
  }
}
