/**
 * Errors that carry the HTTP status they should be answered with.
 * Anything that is not a PanelError is treated as an internal failure.
 */
export class PanelError extends Error {
  readonly status: number;

  constructor(message: string, status = 500) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

/** Malformed or missing export selection. */
export class SelectionError extends PanelError {
  constructor(message: string) {
    super(message, 400);
  }
}

/** Rejected SQL upload; raised before any statement runs. */
export class UploadError extends PanelError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class ConfigError extends PanelError {
  constructor(message: string) {
    super(message, 500);
  }
}
