/**
 * Tempdeck error taxonomy
 *
 * A single error class tagged with a kind. Callers switch on `kind`; errors
 * raised by the serial library (e.g. the port failed to open) are passed
 * through untouched and are never a TempdeckError.
 */

export type TempdeckErrorKind =
  | "device_not_found"
  | "response_timeout"
  | "invalid_response";

export class TempdeckError extends Error {
  public readonly name = "TempdeckError";

  constructor(
    public readonly kind: TempdeckErrorKind,
    message: string,
    /** Raw line that failed validation, for invalid_response */
    public readonly response?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TempdeckError);
    }
  }

  toJSON() {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      response: this.response,
    };
  }
}

export function deviceNotFound(message: string): TempdeckError {
  return new TempdeckError("device_not_found", message);
}

export function responseTimeout(): TempdeckError {
  return new TempdeckError(
    "response_timeout",
    "No response line received before the read timeout (is this really a tempdeck?)"
  );
}

export function invalidResponse(
  message: string,
  response: string,
  cause?: unknown
): TempdeckError {
  return new TempdeckError("invalid_response", message, response, cause === undefined ? undefined : { cause });
}

export function isTempdeckError(err: unknown, kind?: TempdeckErrorKind): err is TempdeckError {
  return err instanceof TempdeckError && (kind === undefined || err.kind === kind);
}
