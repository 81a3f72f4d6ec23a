declare const brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [brand]: B };

/** Names an editor kind, e.g. "enum-editor". */
export type EditorId = Brand<string, 'EditorId'>;
/** Names a file type, e.g. "enum". */
export type FileTypeId = Brand<string, 'FileTypeId'>;
export type PluginId = Brand<string, 'PluginId'>;

export const editorId = (id: string): EditorId => id as EditorId;
export const fileTypeId = (id: string): FileTypeId => id as FileTypeId;
export const pluginId = (id: string): PluginId => id as PluginId;

/** How a document of a file type is laid out on disk. */
export type FileStructure =
  | { kind: 'single-file' }
  | {
      kind: 'folder';
      /** File inside the folder that holds the document's canonical content. */
      markerFile: string;
      /** Extra files created next to the marker when a document is scaffolded. */
      templateStructure: { path: string; content: string }[];
    };

export interface FileTypeDefinition {
  id: FileTypeId;
  extension: string;
  displayName: string;
  icon: string;
  color: string;
  structure: FileStructure;
  defaultContent: Record<string, unknown>;
  categories: string[];
}

export interface EditorMetadata {
  id: EditorId;
  displayName: string;
  supportedFileTypes: FileTypeId[];
}

export interface PluginMetadata {
  id: PluginId;
  name: string;
  version: string;
  author: string;
  description: string;
}
