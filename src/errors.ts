/**
 * Errors raised while reading a BigSMILES string. Wrapping errors keep the
 * original one as `cause`, so `fullMessage` can print the whole chain.
 */
export class BigSMILESError extends Error {
  readonly position: number;

  constructor(message: string, options: { cause?: unknown; position?: number } = {}) {
    super(message, { cause: options.cause });
    this.name = 'BigSMILESError';
    this.position = options.position ?? -1;
  }

  /** Innermost BigSMILESError of the cause chain. */
  get rootCause(): BigSMILESError {
    let error: BigSMILESError = this;
    while (error.cause instanceof BigSMILESError) {
      error = error.cause;
    }
    return error;
  }

  get fullMessage(): string {
    const lines: string[] = [this.message];
    let cause = this.cause;
    let depth = 1;
    while (cause instanceof Error) {
      lines.push('\t'.repeat(depth) + cause.message);
      cause = cause.cause;
      depth++;
    }
    return lines.join('\n');
  }
}

export class TokenizeError extends BigSMILESError {
  constructor(message: string, options: { cause?: unknown; position?: number } = {}) {
    super(message, options);
    this.name = 'TokenizeError';
  }
}

export class ConstructorError extends BigSMILESError {
  constructor(message: string, options: { cause?: unknown; position?: number } = {}) {
    super(message, options);
    this.name = 'ConstructorError';
  }
}

export class ValidationError extends BigSMILESError {
  constructor(message: string, options: { cause?: unknown; position?: number } = {}) {
    super(message, options);
    this.name = 'ValidationError';
  }
}
