/**
 * corepipe — Error hierarchy
 *
 * Every error surfaced by the engine layer is an AppError carrying a
 * status code and a stable machine-readable code.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public statusCode = 500,
    public code?: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** Missing or malformed caller input. */
export class ValidationError extends AppError {
  constructor(message = 'Validation failed') {
    super(message, 400, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not found') {
    super(message, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/** A duplicate instance, or a switch already running on the same instance. */
export class ConflictError extends AppError {
  constructor(message = 'Conflict') {
    super(message, 409, 'CONFLICT');
    this.name = 'ConflictError';
  }
}

/** The template cannot run on the agent's core version. */
export class CompatibilityError extends AppError {
  constructor(
    message: string,
    public readonly reasons: string[] = [],
  ) {
    super(message, 422, 'INCOMPATIBLE');
    this.name = 'CompatibilityError';
  }
}

/** Input that is not parseable JSON/JSONC for the requested engine. */
export class CodecError extends AppError {
  constructor(message: string) {
    super(message, 400, 'CODEC_ERROR');
    this.name = 'CodecError';
  }
}

export type TemplateErrorKind = 'syntax' | 'execution' | 'invalid_json';

export class TemplateError extends AppError {
  constructor(
    public readonly kind: TemplateErrorKind,
    message: string,
  ) {
    super(message, 400, 'TEMPLATE_ERROR');
    this.name = 'TemplateError';
  }
}

/**
 * Transport or agent-side failure of a remote call.
 * switchLogId is set when the failure has already been recorded in the audit log.
 */
export class AgentRpcError extends AppError {
  constructor(
    message: string,
    public readonly switchLogId?: string,
  ) {
    super(message, 502, 'AGENT_RPC_ERROR');
    this.name = 'AgentRpcError';
  }
}

/** Render an unknown thrown value as a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
