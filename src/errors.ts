export class SequencerError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "SequencerError";
  }
}

export class ConfigError extends SequencerError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class DuplicateIndexError extends SequencerError {
  constructor(public readonly index: number) {
    super(`Index for job already exists: ${index}`);
    this.name = "DuplicateIndexError";
  }
}

export class InvalidIndexError extends SequencerError {
  constructor(public readonly index: number) {
    super(`Job index must be an integer, got ${index}`);
    this.name = "InvalidIndexError";
  }
}

export class DisposedError extends SequencerError {
  constructor() {
    super("Cannot add job to a disposed sequencer");
    this.name = "DisposedError";
  }
}

export class ReentrantExecutionError extends SequencerError {
  constructor(public readonly index: number) {
    super(`Tried to execute job with index already in execution (${index})`);
    this.name = "ReentrantExecutionError";
  }
}

export class JobFailedError extends SequencerError {
  constructor(public readonly index: number, cause: unknown) {
    super(`Job ${index} failed: ${describeError(cause)}`, cause);
    this.name = "JobFailedError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
