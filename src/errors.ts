export type ErrorKind =
  | "io"
  | "empty-input"
  | "no-selection"
  | "backend"
  | "config";

export class EditorError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "EditorError";
  }
}

export class IoError extends EditorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("io", message, options);
    this.name = "IoError";
  }
}

export class EmptyInputError extends EditorError {
  constructor(message = "Cannot send empty buffer. Please write the question") {
    super("empty-input", message);
    this.name = "EmptyInputError";
  }
}

export class NoSelectionError extends EditorError {
  constructor(message = "Nothing selected") {
    super("no-selection", message);
    this.name = "NoSelectionError";
  }
}

export class BackendError extends EditorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("backend", message, options);
    this.name = "BackendError";
  }
}

export class ConfigError extends EditorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("config", message, options);
    this.name = "ConfigError";
  }
}

/** Control signal that unwinds the main loop; not a failure. */
export class ExitSignal extends Error {
  constructor() {
    super("exit");
    this.name = "ExitSignal";
  }
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  try {
    return String(error);
  } catch {
    return "Failed to get error details";
  }
}

/** Wraps a filesystem failure with the path it concerns. */
export function toIoError(action: string, target: string, error: unknown): IoError {
  if (isNodeError(error) && error.code === "ENOENT") {
    return new IoError(`${action} ${target}: file not found`, { cause: error });
  }
  return new IoError(`${action} ${target}: ${getErrorMessage(error)}`, {
    cause: error,
  });
}
