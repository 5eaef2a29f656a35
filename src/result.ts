export const ResultKind = {
  Success: 'success',
  Failure: 'failure',
  /** Reserved; never produced by the library itself. */
  Stop: 'stop',
  Error: 'error',
  Skip: 'skip',
  Repeat: 'repeat',
  NoTest: 'no-test',
} as const;

export type ResultKind = (typeof ResultKind)[keyof typeof ResultKind];

/** Values handed from one attempt's test function to the next attempt. */
export type DownstreamArgs = Record<string, string>;

/**
 * Outcome of a request, an assertion or a hook.
 *
 * Instances are frozen; use {@link annotateResult} to derive a new one.
 */
export class Result {
  public readonly kind: ResultKind;
  public readonly description: string;
  public readonly downstreamArgs: Readonly<DownstreamArgs>;

  constructor(kind: ResultKind, description = '', downstreamArgs: DownstreamArgs = {}) {
    this.kind = kind;
    this.description = description;
    this.downstreamArgs = Object.freeze({ ...downstreamArgs });
    Object.freeze(this);
  }

  static success(description?: string): Result {
    return new Result(ResultKind.Success, description);
  }

  static failure(description?: string): Result {
    return new Result(ResultKind.Failure, description);
  }

  static error(description: string): Result {
    return new Result(ResultKind.Error, description);
  }

  static skip(description?: string): Result {
    return new Result(ResultKind.Skip, description);
  }

  static repeat(downstreamArgs?: DownstreamArgs, description?: string): Result {
    return new Result(ResultKind.Repeat, description, downstreamArgs);
  }

  static noTest(): Result {
    return new Result(ResultKind.NoTest);
  }

  /** Description of an `Error` result; empty for every other kind. */
  error(): string {
    return this.kind === ResultKind.Error ? this.description : '';
  }

  isSuccess(): boolean {
    return this.kind === ResultKind.Success;
  }
}

export function annotateResult(result: Result, prefix: string): Result {
  return new Result(result.kind, `${prefix}: ${result.description}`, { ...result.downstreamArgs });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
