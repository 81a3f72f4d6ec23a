import {
  ENUM_EDITOR_ID, ENUM_EXTENSION, ENUM_FILE_TYPE_ID, ENUM_MARKER_FILE,
  PLUGIN_ID, PLUGIN_NAME, PLUGIN_VERSION,
} from '../../constants.js';
import type { EditorMetadata, FileTypeDefinition, PluginMetadata } from './types.js';
import { editorId, fileTypeId, pluginId } from './types.js';

export const ENUM_FILE_TYPE: FileTypeDefinition = {
  id: fileTypeId(ENUM_FILE_TYPE_ID),
  extension: ENUM_EXTENSION,
  displayName: 'Enum Definition',
  icon: 'list',
  color: '#673AB7',
  structure: {
    kind: 'folder',
    markerFile: ENUM_MARKER_FILE,
    templateStructure: [],
  },
  defaultContent: {
    name: 'NewEnum',
    variants: [],
  },
  categories: ['Types'],
};

export const ENUM_EDITOR: EditorMetadata = {
  id: editorId(ENUM_EDITOR_ID),
  displayName: 'Enum Editor',
  supportedFileTypes: [ENUM_FILE_TYPE.id],
};

export const PLUGIN_METADATA: PluginMetadata = {
  id: pluginId(PLUGIN_ID),
  name: PLUGIN_NAME,
  version: PLUGIN_VERSION,
  author: 'Enum Editor contributors',
  description: 'Multi-panel editor for creating enum definitions',
};
