// Plugin entry
export { createPlugin, createContainer, loadPlugin } from './plugin.js';
export type { PluginOptions } from './plugin.js';

// DI
export { Container, createToken } from './di/container.js';
export type { Token, Disposable } from './di/container.js';
export { Tokens } from './di/tokens.js';

// Infrastructure
export { SharedHandle } from './infra/shared.js';
export type { DisposableValue } from './infra/shared.js';
export { SyncLock } from './infra/lock.js';
export { Semaphore } from './infra/semaphore.js';
export { JsonFile } from './infra/json-file.js';
export type { JsonFileOptions } from './infra/json-file.js';
export { ok, err, unwrap } from './infra/types.js';
export type { Result } from './infra/types.js';
export {
  PluginError, EditorNotFoundError, NoEditorForFileError, ConstructionFailedError,
  SaveFailedError, ReloadFailedError, DocumentNotFoundError, DocumentFormatError,
  NotFoundError, ValidationError, DuplicateError, InvariantViolationError,
} from './infra/errors.js';

// Logging
export { Logger, stderrTransport, memoryTransport } from './logging/logger.js';
export type { LogLevel, LogEntry, Transport } from './logging/logger.js';

// Config
export { ConfigLoader, resolveConfig } from './domain/config/loader.js';
export { DEFAULT_CONFIG } from './domain/config/types.js';
export type { PluginConfig, ResolvedConfig } from './domain/config/types.js';

// Descriptor
export { ENUM_FILE_TYPE, ENUM_EDITOR, PLUGIN_METADATA } from './domain/descriptor/enum-descriptor.js';
export { resolveDocumentPath, supportsFileType, fileTypeForPath } from './domain/descriptor/resolve.js';
export { scaffoldDocument } from './domain/descriptor/scaffold.js';
export { editorId, fileTypeId, pluginId } from './domain/descriptor/types.js';
export type {
  EditorId, FileTypeId, PluginId, FileStructure, FileTypeDefinition, EditorMetadata, PluginMetadata,
} from './domain/descriptor/types.js';

// Enum entity
export { EnumEditor } from './domain/enum/editor.js';
export type { EnumEditorOptions } from './domain/enum/editor.js';
export { parseEnumDefinition } from './domain/enum/schema.js';
export type { EnumDefinition, EnumVariant, EnumChange } from './domain/enum/types.js';

// Instances
export { InstanceRegistry } from './domain/instance/registry.js';
export { EntityInstance } from './domain/instance/wrapper.js';
export type {
  InstanceId, InstanceRecord, EditorInstance, EditorPanel, EditableEntity, EditorContext, OperationError,
} from './domain/instance/types.js';

// Plugin
export { EditorFactory } from './domain/plugin/factory.js';
export { EnumEditorPlugin, enumEditorBinding } from './domain/plugin/enum-plugin.js';
export type { EnumEditorInstance } from './domain/plugin/enum-plugin.js';
export { PluginManager } from './domain/plugin/manager.js';
export type { OpenEditorError } from './domain/plugin/manager.js';
export type {
  EditorPlugin, EditorBinding, CreatedEditor, CreateEditorError, CreateEditorResult, PluginEntry, PluginStatus,
} from './domain/plugin/types.js';
