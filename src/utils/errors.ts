export class JournalExportError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'JournalExportError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InputUnavailableError extends JournalExportError {
  public readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    super(`Cannot read journal export at ${path}`, 'INPUT_UNAVAILABLE', options);
    this.name = 'InputUnavailableError';
    this.path = path;
  }
}

export class DecodeError extends JournalExportError {
  constructor(message: string, code = 'DECODE_ERROR', options?: ErrorOptions) {
    super(message, code, options);
    this.name = 'DecodeError';
  }
}

export class ConversionError extends JournalExportError {
  public readonly exitCode: number | null;
  public readonly stderr: string;

  constructor(
    message: string,
    details: { exitCode?: number | null; stderr?: string } = {},
    options?: ErrorOptions
  ) {
    super(message, 'CONVERSION_FAILED', options);
    this.name = 'ConversionError';
    this.exitCode = details.exitCode ?? null;
    this.stderr = details.stderr ?? '';
  }
}

export class InvariantViolationError extends JournalExportError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'INVARIANT_VIOLATION', options);
    this.name = 'InvariantViolationError';
  }
}

export class ConfigError extends JournalExportError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
