export type ReconcileErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'UNREACHABLE_HOST'
  | 'REMOTE_ACCESS_ERROR'
  | 'APPLY_FAILURE';

export class ReconcileError extends Error {
  public readonly code: ReconcileErrorCode;

  public constructor(
    code: ReconcileErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// Bad or missing input. Raised before any host is contacted.
export class ConfigurationError extends ReconcileError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION_ERROR', message, options);
  }
}

export class UnreachableHostError extends ReconcileError {
  public readonly host: string;

  public constructor(host: string, message: string) {
    super('UNREACHABLE_HOST', message);
    this.host = host;
  }
}

export class RemoteAccessError extends ReconcileError {
  public readonly host: string;

  public constructor(
    host: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super('REMOTE_ACCESS_ERROR', message, options);
    this.host = host;
  }
}

export class ApplyFailure extends ReconcileError {
  public readonly host: string;
  public readonly resultCode: number;

  public constructor(host: string, resultCode: number) {
    super(
      'APPLY_FAILURE',
      `DNS update on ${host} returned code ${resultCode.toString()}; ` +
        "fix the cause and re-run with --prev-log pointing at this run's record",
    );
    this.host = host;
    this.resultCode = resultCode;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
