import { Container } from './di/container.js';
import { Tokens } from './di/tokens.js';
import { Logger, stderrTransport } from './logging/logger.js';
import { LOG_CONTEXT } from './constants.js';
import { ConfigLoader, resolveConfig } from './domain/config/loader.js';
import type { PluginConfig } from './domain/config/types.js';
import { InstanceRegistry } from './domain/instance/registry.js';
import { EditorFactory } from './domain/plugin/factory.js';
import { EnumEditorPlugin, enumEditorBinding } from './domain/plugin/enum-plugin.js';

export interface PluginOptions {
  config?: PluginConfig;
  /** Defaults to a logger writing to stderr at the configured level. */
  logger?: Logger;
}

/** Wires logger, config, registry, factory and plugin into one container. */
export function createContainer(options?: PluginOptions): Container {
  const config = resolveConfig(options?.config);
  const root = options?.logger
    ?? new Logger({ level: config.logging.level }).addTransport(stderrTransport);
  const logger = root.child(LOG_CONTEXT.PLUGIN);

  return new Container()
    .value(Tokens.Config, config)
    .value(Tokens.Logger, logger)
    .register(Tokens.InstanceRegistry, (c) =>
      new InstanceRegistry(c.resolve(Tokens.Logger).child(LOG_CONTEXT.REGISTRY), {
        firstId: c.resolve(Tokens.Config).registry.firstInstanceId,
      }))
    .register(Tokens.EditorFactory, (c) => {
      const factoryLogger = c.resolve(Tokens.Logger).child(LOG_CONTEXT.FACTORY);
      return new EditorFactory(c.resolve(Tokens.InstanceRegistry), factoryLogger)
        .bind(enumEditorBinding(c.resolve(Tokens.Config), c.resolve(Tokens.Logger)));
    })
    .register(Tokens.Plugin, (c) =>
      new EnumEditorPlugin(
        c.resolve(Tokens.InstanceRegistry),
        c.resolve(Tokens.EditorFactory),
        c.resolve(Tokens.Logger),
      ));
}

export function createPlugin(options?: PluginOptions): EnumEditorPlugin {
  return createContainer(options).resolve(Tokens.Plugin);
}

/** Reads `enum-editor.json` from `configDir` and builds the plugin from it. */
export async function loadPlugin(configDir: string, logger?: Logger): Promise<EnumEditorPlugin> {
  const config = await new ConfigLoader().load(configDir);
  return createPlugin({ config, logger });
}
