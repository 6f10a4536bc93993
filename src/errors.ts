/**
 * Error taxonomy shared by the stores, the feedback pipeline and the surfaces.
 *
 * Every error carries a `kind` tag so callers can branch on it without
 * `instanceof` chains (the MCP server reports `kind: message`).
 */

export type ErrorKind =
  | 'validation'
  | 'not_found'
  | 'state_conflict'
  | 'extraction_failure'
  | 'persistence';

export abstract class FormulationError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends FormulationError {
  readonly kind = 'validation';

  constructor(
    message: string,
    readonly issues: string[] = [message]
  ) {
    super(message);
  }
}

export class NotFoundError extends FormulationError {
  readonly kind = 'not_found';

  constructor(
    readonly entity: 'recommendation' | 'memory',
    readonly key: string
  ) {
    super(entity === 'memory'
      ? `Memory with title '${key}' not found`
      : `Recommendation ${key} not found`);
  }
}

export type ConflictReason =
  | 'illegal_transition'
  | 'terminal_state'
  | 'duplicate_title'
  | 'in_flight';

export class StateConflictError extends FormulationError {
  readonly kind = 'state_conflict';

  constructor(
    message: string,
    readonly reason: ConflictReason
  ) {
    super(message);
  }
}

// Raised by MemoryStore.add when the title is already taken.
export class DuplicateTitleError extends StateConflictError {
  constructor(readonly title: string) {
    super(`Memory with title '${title}' already exists`, 'duplicate_title');
  }
}

export class ExtractionFailure extends FormulationError {
  readonly kind = 'extraction_failure';
}

export class PersistenceError extends FormulationError {
  readonly kind = 'persistence';

  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export function isFormulationError(error: unknown): error is FormulationError {
  return error instanceof FormulationError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
