export type CompilerErrorCode =
  | 'MALFORMED_LINK'
  | 'INVALID_PORT'
  | 'UNSUPPORTED_TRANSPORT'
  | 'INVALID_ENVIRONMENT';

export interface CompilerErrorParams {
  field: string;
  message: string;
  details?: Record<string, unknown>;
}

export class CompilerError extends Error {
  public readonly code: CompilerErrorCode;
  public readonly field: string;
  public readonly details?: Record<string, unknown>;

  public constructor(code: CompilerErrorCode, params: CompilerErrorParams) {
    super(params.message);
    this.name = new.target.name;
    this.code = code;
    this.field = params.field;
    if (params.details !== undefined) {
      this.details = params.details;
    }
  }
}

export class MalformedLinkError extends CompilerError {
  public constructor(params: CompilerErrorParams) {
    super('MALFORMED_LINK', params);
  }
}

export class InvalidPortError extends CompilerError {
  public constructor(params: CompilerErrorParams) {
    super('INVALID_PORT', params);
  }
}

export class UnsupportedTransportError extends CompilerError {
  public constructor(params: CompilerErrorParams) {
    super('UNSUPPORTED_TRANSPORT', params);
  }
}

export class InvalidEnvironmentError extends CompilerError {
  public constructor(params: CompilerErrorParams) {
    super('INVALID_ENVIRONMENT', params);
  }
}

export function formatCompilerError(error: CompilerError): string {
  return `${error.code}: ${error.field}: ${error.message}`;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof CompilerError) return formatCompilerError(error);
  if (error instanceof Error) return error.message;
  return String(error);
}
