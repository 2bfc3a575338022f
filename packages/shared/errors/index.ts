/**
 * Mnemo error kinds.
 *
 * The ranking engine never throws. The store throws ValidationError,
 * DuplicateIdError and StorageUnavailableError. Collaborator failures
 * (embedding, clipboard, picker) surface as ExternalCollaboratorError.
 * Comparing vectors of different models is not an error: those nodes are
 * excluded from the semantic term instead.
 */

export type MnemoErrorCode =
  | 'VALIDATION'
  | 'DUPLICATE_ID'
  | 'STORAGE_UNAVAILABLE'
  | 'EXTERNAL_COLLABORATOR';

export abstract class MnemoError extends Error {
  abstract readonly code: MnemoErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends MnemoError {
  readonly code = 'VALIDATION';
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.field = field;
  }
}

export class DuplicateIdError extends MnemoError {
  readonly code = 'DUPLICATE_ID';
  readonly nodeId: string;

  constructor(nodeId: string, options?: { cause?: unknown }) {
    super(`Node ${nodeId} already exists`, options);
    this.nodeId = nodeId;
  }
}

export class StorageUnavailableError extends MnemoError {
  readonly code = 'STORAGE_UNAVAILABLE';
  readonly operation: string;
  readonly sqliteCode: string | null;

  constructor(operation: string, sqliteCode: string | null, options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Storage unavailable during ${operation} (${sqliteCode ?? 'unknown'})${detail}`, options);
    this.operation = operation;
    this.sqliteCode = sqliteCode;
  }
}

export type Collaborator = 'embedding' | 'clipboard' | 'keystroke' | 'picker';

export class ExternalCollaboratorError extends MnemoError {
  readonly code = 'EXTERNAL_COLLABORATOR';
  readonly collaborator: Collaborator;

  constructor(collaborator: Collaborator, message: string, options?: { cause?: unknown }) {
    super(`${collaborator}: ${message}`, options);
    this.collaborator = collaborator;
  }
}

/**
 * Thrown by withTimeout when the embedding provider exceeds its time limit.
 */
export class EmbeddingTimeoutError extends ExternalCollaboratorError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('embedding', `encode timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export function errorCode(err: unknown): string | null {
  return err instanceof MnemoError ? err.code : null;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
