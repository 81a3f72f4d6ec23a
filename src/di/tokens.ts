import { createToken } from './container.js';
import type { Logger } from '../logging/logger.js';
import type { ResolvedConfig } from '../domain/config/types.js';
import type { InstanceRegistry } from '../domain/instance/registry.js';
import type { EditorFactory } from '../domain/plugin/factory.js';
import type { EnumEditorPlugin } from '../domain/plugin/enum-plugin.js';

export const Tokens = {
  Logger: createToken<Logger>('Logger'),
  Config: createToken<ResolvedConfig>('Config'),

  InstanceRegistry: createToken<InstanceRegistry>('InstanceRegistry'),
  EditorFactory: createToken<EditorFactory>('EditorFactory'),
  Plugin: createToken<EnumEditorPlugin>('Plugin'),
} as const;
