export class PluginError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'PluginError';
  }
}

/** Routing: the requested editor kind is not provided by the plugin. */
export class EditorNotFoundError extends PluginError {
  constructor(public readonly editorId: string) {
    super(`Editor not found: ${editorId}`, 'EDITOR_NOT_FOUND', { editorId });
    this.name = 'EditorNotFoundError';
  }
}

/** Routing: no active plugin handles the file type of a path. */
export class NoEditorForFileError extends PluginError {
  constructor(public readonly filePath: string) {
    super(`No editor registered for file: ${filePath}`, 'NO_EDITOR_FOR_FILE', { filePath });
    this.name = 'NoEditorForFileError';
  }
}

export class ConstructionFailedError extends PluginError {
  constructor(
    public readonly filePath: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to open editor for ${filePath}: ${reason}`, 'CONSTRUCTION_FAILED', { filePath, reason }, options);
    this.name = 'ConstructionFailedError';
  }
}

export class SaveFailedError extends PluginError {
  constructor(
    public readonly filePath: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to save ${filePath}: ${reason}`, 'SAVE_FAILED', { filePath, reason }, options);
    this.name = 'SaveFailedError';
  }
}

export class ReloadFailedError extends PluginError {
  constructor(
    public readonly filePath: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to reload ${filePath}: ${reason}`, 'RELOAD_FAILED', { filePath, reason }, options);
    this.name = 'ReloadFailedError';
  }
}

export class DocumentNotFoundError extends PluginError {
  constructor(public readonly filePath: string) {
    super(`Document not found: ${filePath}`, 'DOCUMENT_NOT_FOUND', { filePath });
    this.name = 'DocumentNotFoundError';
  }
}

/** The content of a document does not have the expected shape. */
export class DocumentFormatError extends PluginError {
  constructor(
    public readonly filePath: string,
    public readonly errors: string[],
  ) {
    super(`Malformed document ${filePath}: ${errors.join('; ')}`, 'DOCUMENT_FORMAT', { filePath, errors });
    this.name = 'DocumentFormatError';
  }
}

export class NotFoundError extends PluginError {
  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`, 'NOT_FOUND', { entity, id });
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends PluginError {
  constructor(
    message: string,
    public readonly errors: string[],
  ) {
    super(message, 'VALIDATION_ERROR', { errors });
    this.name = 'ValidationError';
  }
}

export class DuplicateError extends PluginError {
  constructor(entity: string, id: string) {
    super(`${entity} already exists: ${id}`, 'DUPLICATE', { entity, id });
    this.name = 'DuplicateError';
  }
}

/**
 * A broken internal guarantee (duplicate instance id, re-entrant lock).
 * Never returned as a result; always thrown.
 */
export class InvariantViolationError extends PluginError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVARIANT_VIOLATION', details);
    this.name = 'InvariantViolationError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
