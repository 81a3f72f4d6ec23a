import type { LogLevel } from '../../logging/logger.js';

export interface PluginConfig {
  logging?: {
    level?: LogLevel;
  };
  registry?: {
    /** First id handed out by the instance registry. */
    firstInstanceId?: number;
  };
  documents?: {
    /** JSON indentation used when an enum document is saved. */
    indent?: number;
  };
}

export interface ResolvedConfig {
  logging: { level: LogLevel };
  registry: { firstInstanceId: number };
  documents: { indent: number };
}

export const DEFAULT_CONFIG: ResolvedConfig = {
  logging: { level: 'info' },
  registry: { firstInstanceId: 0 },
  documents: { indent: 2 },
};
