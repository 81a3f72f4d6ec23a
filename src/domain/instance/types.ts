import type { ReloadFailedError, SaveFailedError } from '../../infra/errors.js';
import type { DisposableValue, SharedHandle } from '../../infra/shared.js';
import type { Result } from '../../infra/types.js';
import type { Logger } from '../../logging/logger.js';

export type InstanceId = number;

/** A renderable panel the host docks. Shared between host and registry. */
export interface EditorPanel extends DisposableValue {
  readonly panelId: string;
  title(): string;
}

/** One open document with its own persistence. */
export interface EditableEntity {
  readonly filePath: string;
  save(): Promise<void>;
  reload(): Promise<void>;
  isDirty(): boolean;
}

/** Passed by the host to instance operations. */
export interface EditorContext {
  logger: Logger;
}

export type OperationError = SaveFailedError | ReloadFailedError;

/** Any class whose instances are `T`, including classes with private constructors. */
export type Constructor<T> = Function & { prototype: T };

/** Host-facing contract every open editor exposes, whatever its document type. */
export interface EditorInstance {
  filePath(): string;
  save(ctx?: EditorContext): Promise<Result<void, OperationError>>;
  reload(ctx?: EditorContext): Promise<Result<void, OperationError>>;
  isDirty(): boolean;
  /** The wrapped entity, for hosts that inspect it themselves. */
  asDynamic(): unknown;
  /** The wrapped entity when it is a `ctor`, otherwise undefined. */
  downcast<T>(ctor: Constructor<T>): T | undefined;
}

export interface InstanceRecord {
  panel: SharedHandle<EditorPanel>;
  instance: EditorInstance;
}
