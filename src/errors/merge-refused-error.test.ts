import { describe, it, expect } from 'vitest';
import { MergeRefusedError } from './merge-refused-error';

describe('MergeRefusedError', () => {
  it('should create error with PR number and reasons', () => {
    const error = new MergeRefusedError('Refusing to merge PR #7', 7, ['IS_DRAFT']);

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('MergeRefusedError');
    expect(error.prNumber).toBe(7);
    expect(error.reasons).toEqual(['IS_DRAFT']);
    expect(error.cause).toBeUndefined();
  });

  it('should create error with cause', () => {
    const cause = new Error('GraphQL error');
    const error = new MergeRefusedError('Refusing to merge PR #7', 7, ['IS_DRAFT'], cause);

    expect(error.cause).toBe(cause);
  });

  it('should have proper stack trace', () => {
    const error = new MergeRefusedError('Test error', 1, []);

    expect(error.stack).toContain('MergeRefusedError');
  });
});
