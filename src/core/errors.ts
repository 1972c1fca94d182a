import { Code } from '@connectrpc/connect';

/** Malformed or ill-typed wire input. The envelope that failed must be discarded. */
export class DecodeError extends Error {
  override name = 'DecodeError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** A payload value that cannot be serialized (e.g. a string that is not valid UTF-16). */
export class EncodeError extends Error {
  override name = 'EncodeError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * A failed Export call. Handlers throw it to pick a status code other than
 * Code.Unknown; clients reject with it, carrying the status message verbatim.
 */
export class ExportError extends Error {
  override name = 'ExportError';

  constructor(
    message: string,
    readonly code: Code = Code.Unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** A config value that could not be decoded into its target shape. */
export class ConfigDecodeError extends Error {
  override name = 'ConfigDecodeError';

  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
