import { describe, it, expect } from 'vitest';
import {
  DuplicateTitleError,
  ExtractionFailure,
  NotFoundError,
  PersistenceError,
  StateConflictError,
  ValidationError,
  errorMessage,
  isFormulationError,
} from '../../src/errors.js';

describe('error taxonomy', () => {
  it('tags every error with its kind and class name', () => {
    const errors = [
      new ValidationError('bad'),
      new NotFoundError('recommendation', 'rec_1'),
      new StateConflictError('busy', 'in_flight'),
      new ExtractionFailure('no output'),
      new PersistenceError('disk full', '/tmp/x'),
    ];

    expect(errors.map((e) => e.kind)).toEqual([
      'validation',
      'not_found',
      'state_conflict',
      'extraction_failure',
      'persistence',
    ]);
    expect(errors.map((e) => e.name)).toEqual([
      'ValidationError',
      'NotFoundError',
      'StateConflictError',
      'ExtractionFailure',
      'PersistenceError',
    ]);
    expect(errors.every(isFormulationError)).toBe(true);
  });

  it('words not-found messages per entity', () => {
    expect(new NotFoundError('recommendation', 'rec_1').message).toBe('Recommendation rec_1 not found');
    expect(new NotFoundError('memory', 'Urea helps').message).toBe("Memory with title 'Urea helps' not found");
  });

  it('treats a duplicate title as a state conflict', () => {
    const error = new DuplicateTitleError('Urea helps');
    expect(error).toBeInstanceOf(StateConflictError);
    expect(error.reason).toBe('duplicate_title');
    expect(error.message).toBe("Memory with title 'Urea helps' already exists");
  });

  it('defaults validation issues to the message', () => {
    expect(new ValidationError('bad').issues).toEqual(['bad']);
  });

  it('describes anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(isFormulationError(new Error('x'))).toBe(false);
  });
});
