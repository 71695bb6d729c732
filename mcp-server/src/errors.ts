// Error model shared by the pipeline stages and the tool layer.

export type PipelineErrorCode =
  | 'INVALID_ARGUMENTS'
  | 'INVALID_LOCATOR'
  | 'PATH_ESCAPES_ROOT'
  | 'HANDLE_NOT_FOUND'
  | 'DOCUMENT_NOT_FOUND'
  | 'DOCUMENT_INVALID'
  | 'STORAGE_ERROR'
  | 'PLAN_NOT_FOUND'
  | 'PLAN_ALREADY_APPLIED'
  | 'PLAN_REJECTED'
  | 'UNSUPPORTED_INTENT'
  | 'TARGET_NOT_FOUND'
  | 'PREVIEW_REQUIRED'
  | 'AMBIGUOUS_TARGET'
  | 'UNSAFE_WILDCARD'
  | 'CONFIRMATION_REQUIRED'
  | 'APPLY_FAILED'
  | 'BUSY'
  | 'CANCELLED';

export interface ErrorPayload {
  errorCode: PipelineErrorCode | 'INTERNAL_ERROR';
  message: string;
  details?: Record<string, unknown>;
  hint?: string;
  retryable?: boolean;
}

export interface PipelineErrorOptions {
  details?: Record<string, unknown>;
  hint?: string;
  retryable?: boolean;
  cause?: unknown;
}

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly details?: Record<string, unknown>;
  readonly hint?: string;
  readonly retryable: boolean;

  constructor(code: PipelineErrorCode, message: string, options: PipelineErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'PipelineError';
    this.code = code;
    this.details = options.details;
    this.hint = options.hint;
    this.retryable = options.retryable ?? false;
  }

  toPayload(): ErrorPayload {
    const payload: ErrorPayload = { errorCode: this.code, message: this.message };
    if (this.details) payload.details = this.details;
    if (this.hint) payload.hint = this.hint;
    if (this.retryable) payload.retryable = true;
    return payload;
  }
}

export function isPipelineError(err: unknown, code?: PipelineErrorCode): err is PipelineError {
  return err instanceof PipelineError && (code === undefined || err.code === code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// JSON-RPC error codes used when a pipeline error surfaces through a resource read.
const MCP_CODES: Partial<Record<PipelineErrorCode, number>> = {
  HANDLE_NOT_FOUND: -32040,
  DOCUMENT_NOT_FOUND: -32044,
  PATH_ESCAPES_ROOT: -32043,
  INVALID_LOCATOR: -32602,
  INVALID_ARGUMENTS: -32602,
  BUSY: -32045,
};

export const DEFAULT_MCP_ERROR_CODE = -32000;

export function mcpCodeFor(code: PipelineErrorCode): number {
  return MCP_CODES[code] ?? DEFAULT_MCP_ERROR_CODE;
}

export function cancelledError(stage: string): PipelineError {
  return new PipelineError('CANCELLED', `Request cancelled before ${stage}`, { details: { stage } });
}

/** Fail CANCELLED when the caller has gone away; checked before each commit point. */
export function throwIfCancelled(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) throw cancelledError(stage);
}
