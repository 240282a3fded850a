import { ZodError } from 'zod';

// ── Error taxonomy ─────────────────────────────────────────────────
// Each error carries the HTTP status it maps to at the request boundary.

export class RecordsError extends Error {
  readonly status: number;

  constructor(status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }
}

export class NotFoundError extends RecordsError {
  constructor(message = 'Record not found') {
    super(404, message);
  }
}

export class BatchTooLargeError extends RecordsError {
  constructor(maxSize: number) {
    super(400, `Batch size cannot exceed ${maxSize} records`);
  }
}

export class ValidationError extends RecordsError {
  constructor(message: string) {
    super(400, message);
  }
}

export class PayloadTooLargeError extends RecordsError {
  constructor(maxBytes: number) {
    super(413, `Request payload too large (max ${maxBytes} bytes)`);
  }
}

export class ConfigurationError extends RecordsError {
  constructor(message: string) {
    super(500, message);
  }
}

export class UpstreamFailureError extends RecordsError {
  constructor(message: string, cause?: unknown) {
    const detail = cause === undefined ? message : `${message}: ${describeCause(cause)}`;
    super(502, detail, { cause });
  }
}

export class VectorIndexTimeoutError extends UpstreamFailureError {
  constructor(timeoutMs: number) {
    super(`Vector index did not respond within ${timeoutMs} ms`);
  }
}

// ── Boundary conversion ────────────────────────────────────────────

export interface ErrorBody {
  status: number;
  detail: string;
}

export function toErrorBody(err: unknown): ErrorBody {
  if (err instanceof RecordsError) {
    return { status: err.status, detail: err.message };
  }
  if (err instanceof ZodError) {
    return { status: 400, detail: formatZodError(err) };
  }
  return { status: 500, detail: 'Internal server error' };
}

export function formatZodError(err: ZodError): string {
  return err.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
