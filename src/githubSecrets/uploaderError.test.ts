import { describe, expect, it } from 'vitest';

import {
  describeError,
  getUploaderErrorCode,
  isFatalUploaderError,
  UploaderError,
} from './uploaderError';

describe('uploaderError', () => {
  it('uses the code as the error name', () => {
    const err = new UploaderError('MissingInputFile', 'secrets.env not found');
    expect(err.name).toBe('MissingInputFile');
    expect(getUploaderErrorCode(err)).toBe('MissingInputFile');
    expect(getUploaderErrorCode(new Error('x'))).toBeUndefined();
  });

  it('treats precondition failures as fatal and per-entry failures as not', () => {
    expect(isFatalUploaderError(new UploaderError('MissingDependency', 'x'))).toBe(true);
    expect(isFatalUploaderError(new UploaderError('KeyRetrievalFailure', 'x'))).toBe(true);
    expect(isFatalUploaderError(new UploaderError('UploadFailure', 'x'))).toBe(false);
    expect(isFatalUploaderError(new UploaderError('EncryptionFailure', 'x'))).toBe(false);
    expect(isFatalUploaderError(new Error('x'))).toBe(false);
  });

  it('prefers the remote message of an HTTP error', () => {
    const err = Object.assign(new Error('Request failed with status code 422'), {
      response: { status: 422, data: { message: 'Validation Failed' } },
    });
    expect(describeError(err)).toBe('Validation Failed');
    expect(describeError(new Error('socket hang up'))).toBe('socket hang up');
    expect(describeError('plain')).toBe('plain');
  });
});
