import type { Logger } from '../../logging/logger.js';
import type { ResolvedConfig } from '../config/types.js';
import { ENUM_EDITOR, ENUM_FILE_TYPE, PLUGIN_METADATA } from '../descriptor/enum-descriptor.js';
import type { EditorMetadata, FileTypeDefinition, PluginMetadata } from '../descriptor/types.js';
import { EnumEditor } from '../enum/editor.js';
import type { InstanceRegistry } from '../instance/registry.js';
import type { EditorContext } from '../instance/types.js';
import type { EntityInstance } from '../instance/wrapper.js';
import type { EditorFactory } from './factory.js';
import type { CreateEditorResult, EditorBinding, EditorPlugin } from './types.js';

export type EnumEditorInstance = EntityInstance<EnumEditor>;

export function enumEditorBinding(config: ResolvedConfig, logger: Logger): EditorBinding<EnumEditor> {
  return {
    editor: ENUM_EDITOR,
    fileType: ENUM_FILE_TYPE,
    open: (resolvedPath) => EnumEditor.open(resolvedPath, { indent: config.documents.indent, logger }),
  };
}

export class EnumEditorPlugin implements EditorPlugin {
  constructor(
    private registry: InstanceRegistry,
    private factory: EditorFactory,
    private logger: Logger,
  ) {}

  metadata(): PluginMetadata {
    return PLUGIN_METADATA;
  }

  fileTypes(): FileTypeDefinition[] {
    return [ENUM_FILE_TYPE];
  }

  editors(): EditorMetadata[] {
    return this.factory.editors();
  }

  async createEditor(editorId: string, filePath: string, ctx?: EditorContext): Promise<CreateEditorResult> {
    const result = await this.factory.create(editorId, filePath);
    if (!result.ok) {
      (ctx?.logger ?? this.logger).warn('Editor not opened', {
        editorId, filePath, code: result.error.code, reason: result.error.message,
      });
    }
    return result;
  }

  /** Number of open instances. */
  get openInstances(): number {
    return this.registry.size;
  }

  onLoad(): void {
    this.logger.info('Enum Editor plugin loaded', { version: PLUGIN_METADATA.version });
  }

  onUnload(): number {
    const count = this.registry.clear();
    this.logger.info('Enum Editor plugin unloaded', { cleanedUp: count });
    return count;
  }
}
