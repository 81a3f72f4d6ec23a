import { NoEditorForFileError, NotFoundError, errorMessage } from '../../infra/errors.js';
import { err } from '../../infra/types.js';
import type { Result } from '../../infra/types.js';
import type { Logger } from '../../logging/logger.js';
import { PLUGIN_STATUS } from '../../constants.js';
import { fileTypeForPath, supportsFileType } from '../descriptor/resolve.js';
import type { EditorContext } from '../instance/types.js';
import type {
  CreateEditorError, CreatedEditor, EditorPlugin, PluginEntry, PluginStatus,
} from './types.js';

export type OpenEditorError = CreateEditorError | NoEditorForFileError;

/** Host side: loads editor plugins and routes paths to the editor that handles them. */
export class PluginManager {
  private plugins = new Map<string, PluginEntry>();

  constructor(private logger: Logger) {}

  register(plugin: EditorPlugin): void {
    this.plugins.set(plugin.metadata().id, {
      plugin,
      status: PLUGIN_STATUS.REGISTERED,
    });
  }

  activate(id: string): void {
    const entry = this.getEntry(id);
    try {
      entry.plugin.onLoad();
      entry.status = PLUGIN_STATUS.ACTIVE;
      this.logger.info('Plugin activated', { id });
    } catch (e) {
      entry.status = PLUGIN_STATUS.ERROR;
      entry.error = errorMessage(e);
      this.logger.error('Plugin activation failed', { id, error: entry.error });
      throw e;
    }
  }

  /** Unloads the plugin and returns how many editor instances it dropped. */
  deactivate(id: string): number {
    const entry = this.getEntry(id);
    const count = entry.plugin.onUnload();
    entry.status = PLUGIN_STATUS.UNLOADED;
    this.logger.info('Plugin deactivated', { id, instances: count });
    return count;
  }

  getStatus(id: string): PluginStatus | undefined {
    return this.plugins.get(id)?.status;
  }

  list(): PluginEntry[] {
    return [...this.plugins.values()];
  }

  unloadAll(): number {
    let total = 0;
    for (const [id, entry] of this.plugins) {
      if (entry.status === PLUGIN_STATUS.ACTIVE) {
        total += this.deactivate(id);
      }
    }
    return total;
  }

  /**
   * Opens `filePath` with the first active plugin editor that supports its
   * file type.
   */
  async openEditor(
    filePath: string,
    ctx?: EditorContext,
  ): Promise<Result<CreatedEditor, OpenEditorError>> {
    for (const { plugin, status } of this.plugins.values()) {
      if (status !== PLUGIN_STATUS.ACTIVE) continue;
      const fileType = fileTypeForPath(plugin.fileTypes(), filePath);
      if (!fileType) continue;
      const editor = plugin.editors().find((e) => supportsFileType(e, fileType.id));
      if (editor) {
        return plugin.createEditor(editor.id, filePath, ctx);
      }
    }
    this.logger.warn('No editor for file', { filePath });
    return err(new NoEditorForFileError(filePath));
  }

  private getEntry(id: string): PluginEntry {
    const entry = this.plugins.get(id);
    if (!entry) throw new NotFoundError('Plugin', id);
    return entry;
  }
}
