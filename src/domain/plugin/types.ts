import type { PLUGIN_STATUS } from '../../constants.js';
import type { ConstructionFailedError, EditorNotFoundError } from '../../infra/errors.js';
import type { SharedHandle } from '../../infra/shared.js';
import type { Result } from '../../infra/types.js';
import type {
  EditorMetadata, FileTypeDefinition, PluginMetadata,
} from '../descriptor/types.js';
import type {
  EditableEntity, EditorContext, EditorInstance, EditorPanel, InstanceId,
} from '../instance/types.js';

export interface CreatedEditor {
  id: InstanceId;
  /** The caller's own handle; release it when the panel is closed. */
  panel: SharedHandle<EditorPanel>;
  instance: EditorInstance;
}

export type CreateEditorError = EditorNotFoundError | ConstructionFailedError;

export type CreateEditorResult = Result<CreatedEditor, CreateEditorError>;

/** Ties an editor kind to the file type it edits and the way its entity is built. */
export interface EditorBinding<E extends EditableEntity & EditorPanel = EditableEntity & EditorPanel> {
  editor: EditorMetadata;
  fileType: FileTypeDefinition;
  open: (resolvedPath: string) => Promise<E>;
}

export interface EditorPlugin {
  metadata(): PluginMetadata;
  fileTypes(): FileTypeDefinition[];
  editors(): EditorMetadata[];
  createEditor(editorId: string, filePath: string, ctx?: EditorContext): Promise<CreateEditorResult>;
  onLoad(): void;
  /** Drains every open instance and returns how many were dropped. Never throws. */
  onUnload(): number;
}

export type PluginStatus = (typeof PLUGIN_STATUS)[keyof typeof PLUGIN_STATUS];

export interface PluginEntry {
  plugin: EditorPlugin;
  status: PluginStatus;
  error?: string;
}
