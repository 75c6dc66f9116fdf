import { ParserContext, snapshotContext } from './types.js';
import type { PackageNameRule } from './validate.js';

export type ErrorKind =
  | 'ParameterError'
  | 'MemoryError'
  | 'FileError'
  | 'SyntaxError'
  | 'PackageNameError';

export class ControlError extends Error {
  readonly context?: ParserContext;

  constructor(
    public readonly kind: ErrorKind,
    message: string,
    context?: ParserContext
  ) {
    super(message);
    this.name = kind;
    if (context) {
      this.context = snapshotContext(context);
    }
  }
}

/** Invalid call-time arguments; the caller can always recover. */
export class ParameterError extends ControlError {
  constructor(message: string, context?: ParserContext) {
    super('ParameterError', message, context);
  }
}

export class MemoryError extends ControlError {
  constructor(message: string, context?: ParserContext) {
    super('MemoryError', message, context);
  }
}

/** The input could not be opened or read. */
export class FileError extends ControlError {
  constructor(message: string, public readonly path: string) {
    super('FileError', message);
  }
}

/** A line that does not fit the control file grammar. */
export class ControlSyntaxError extends ControlError {
  constructor(message: string, context?: ParserContext) {
    super('SyntaxError', message, context);
  }
}

export class PackageNameError extends ControlError {
  constructor(
    message: string,
    public readonly packageName: string,
    public readonly rule: Exclude<PackageNameRule, 'valid'>,
    context?: ParserContext
  ) {
    super('PackageNameError', message, context);
  }
}

/**
 * Outcome of an operation that reports failure as a value.
 */
export type Status = { ok: true } | { ok: false; error: ControlError };

/**
 * Outcome carrying a value on success.
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: ControlError };

export function success(): Status {
  return { ok: true };
}

export function failure(error: ControlError): { ok: false; error: ControlError } {
  return { ok: false, error };
}
