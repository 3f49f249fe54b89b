import { describe, expect, it } from 'vitest';

import { ArgumentError, CollectionsError, isArgumentError } from './errors.mjs';

describe('errors', () => {
  it('should describe a size mismatch', () => {
    const error = ArgumentError.sizeMismatch(3, 1);

    expect(error).toBeInstanceOf(CollectionsError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ArgumentError');
    expect(error.message).toBe('Maps do not have the same number of elements');
    expect(error.code).toBe('MAP_SIZE_MISMATCH');
    expect(error.context).toEqual({ leftSize: 3, rightSize: 1 });
  });

  it('should describe a keyset mismatch', () => {
    const error = ArgumentError.keysetMismatch('k2');

    expect(error.message).toBe('Keysets of the maps do not match');
    expect(error.code).toBe('KEYSET_MISMATCH');
    expect(error.context).toEqual({ key: 'k2' });
  });

  it('should recognise argument errors', () => {
    expect(isArgumentError(ArgumentError.sizeMismatch(1, 2))).toBe(true);
    expect(isArgumentError(new CollectionsError('other', 'INVALID_LOG_LEVEL'))).toBe(false);
    expect(isArgumentError(new Error('plain'))).toBe(false);
    expect(isArgumentError('MAP_SIZE_MISMATCH')).toBe(false);
  });
});
