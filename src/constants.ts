/** Plugin identity */
export const PLUGIN_ID = 'dev.enum-editor';
export const PLUGIN_NAME = 'Enum Editor';
export const PLUGIN_VERSION = '0.1.0';

/** Editor kinds and file types provided by this plugin */
export const ENUM_EDITOR_ID = 'enum-editor';
export const ENUM_FILE_TYPE_ID = 'enum';
export const ENUM_EXTENSION = 'enum';
export const ENUM_MARKER_FILE = 'enum.json';

/** File names */
export const CONFIG_FILE = 'enum-editor.json';
export const TMP_SUFFIX = '.tmp';

/** Logger contexts */
export const LOG_CONTEXT = {
  PLUGIN: 'enum-editor',
  REGISTRY: 'registry',
  FACTORY: 'factory',
} as const;

/** Panel handle ids */
export const ID_PREFIX = {
  PANEL: 'panel-',
} as const;
export const NANOID_LENGTH_PANEL = 10;

/** Plugin status values */
export const PLUGIN_STATUS = {
  REGISTERED: 'registered',
  ACTIVE: 'active',
  UNLOADED: 'unloaded',
  ERROR: 'error',
} as const;
