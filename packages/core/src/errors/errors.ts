import type { ErrorKind } from './kinds.js';

export class PixscriptError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends PixscriptError {}

export type InvalidScriptReason = 'empty_script' | 'no_previous_script' | 'script_too_long';

export class InvalidScriptError extends PixscriptError {
  constructor(readonly reason: InvalidScriptReason, message: string = reason) {
    super(message);
  }
}

/** Failure reported by an image backend, optionally pre-classified by the backend itself. */
export class GenerationError extends PixscriptError {
  readonly kind?: ErrorKind;
  readonly status?: number;

  constructor(message: string, options: { kind?: ErrorKind; status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.kind = options.kind;
    this.status = options.status;
  }
}

export class InvalidTransitionError extends PixscriptError {
  constructor(readonly from: string, readonly to: string) {
    super(`Invalid session transition ${from} -> ${to}`);
  }
}
