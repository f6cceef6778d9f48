export type ErrorStage = 'local' | 'primary' | 'explorer' | 'config';

export class SyncCheckError extends Error {
  readonly stage: ErrorStage;

  constructor(stage: ErrorStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SyncCheckError';
    this.stage = stage;
  }
}

/** Network failure, timeout, empty or malformed body, or an RPC-level error. */
export class FetchError extends SyncCheckError {
  constructor(stage: ErrorStage, message: string, options?: { cause?: unknown }) {
    super(stage, message, options);
    this.name = 'FetchError';
  }
}

/** A field that should hold a block number did not. */
export class ParseError extends SyncCheckError {
  constructor(stage: ErrorStage, message: string, options?: { cause?: unknown }) {
    super(stage, message, options);
    this.name = 'ParseError';
  }
}

export class ResolutionExhaustedError extends SyncCheckError {
  readonly tip: number;
  readonly pagesSearched: number;

  constructor(tip: number, pagesSearched: number) {
    super('explorer', `no proven block found searching back from ${tip} (${pagesSearched} pages)`);
    this.name = 'ResolutionExhaustedError';
    this.tip = tip;
    this.pagesSearched = pagesSearched;
  }
}

export class ConfigError extends SyncCheckError {
  constructor(message: string) {
    super('config', message);
    this.name = 'ConfigError';
  }
}

/** Cancellation from an AbortSignal or from readline's Ctrl+C handling. */
export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
