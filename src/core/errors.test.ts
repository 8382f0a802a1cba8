import { describe, it, expect } from 'vitest';
import { ExternalLookupError, InvalidArgumentError, InvalidStateError } from './errors.js';

describe('errors', () => {
  it('should name each error class', () => {
    expect(new InvalidStateError('ended').name).toBe('InvalidStateError');
    expect(new InvalidArgumentError('bad').name).toBe('InvalidArgumentError');
    expect(new ExternalLookupError('down', {}).name).toBe('ExternalLookupError');
  });

  it('should append issues to the message', () => {
    const error = new InvalidArgumentError('Invalid GridWorld parameters', ['width: too small', 'goal: out of bounds']);

    expect(error.message).toBe('Invalid GridWorld parameters: width: too small; goal: out of bounds');
    expect(error.issues).toEqual(['width: too small', 'goal: out of bounds']);
    expect(new InvalidArgumentError('bad').message).toBe('bad');
  });

  it('should keep the failed query and its cause', () => {
    const cause = new Error('connection refused');
    const query = { attribute: 'title', value: 'x', limit: 5 };
    const error = new ExternalLookupError('Knowledge lookup failed', query, cause);

    expect(error).toBeInstanceOf(Error);
    expect(error.query).toBe(query);
    expect(error.cause).toBe(cause);
    expect(new ExternalLookupError('Knowledge lookup failed', query).cause).toBeUndefined();
  });
});
