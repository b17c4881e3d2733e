/**
 * Requirements addressed:
 * - Fatal precondition errors (missing dependency, missing input file, key
 *   retrieval) abort the run before any upload.
 * - Per-entry errors (encryption, upload) are reported and skipped.
 */

export type UploaderErrorCode =
  | 'MissingDependency'
  | 'MissingInputFile'
  | 'KeyRetrievalFailure'
  | 'EncryptionFailure'
  | 'UploadFailure';

const fatalCodes: ReadonlySet<UploaderErrorCode> = new Set([
  'MissingDependency',
  'MissingInputFile',
  'KeyRetrievalFailure',
]);

/**
 * Error raised by the secret uploader. `name` mirrors `code` so the error
 * reads naturally when printed.
 */
export class UploaderError extends Error {
  readonly code: UploaderErrorCode;

  constructor(code: UploaderErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = code;
    this.code = code;
  }
}

type AxiosishError = {
  message?: unknown;
  response?: {
    status?: unknown;
    data?: { message?: unknown };
  };
};

export const getUploaderErrorCode = (
  err: unknown,
): UploaderErrorCode | undefined =>
  err instanceof UploaderError ? err.code : undefined;

export const isUploaderErrorCode = (
  err: unknown,
  code: UploaderErrorCode,
): boolean => getUploaderErrorCode(err) === code;

export const isFatalUploaderError = (err: unknown): boolean => {
  const code = getUploaderErrorCode(err);
  return code ? fatalCodes.has(code) : false;
};

/** Human-readable detail for any thrown value. */
export const describeError = (err: unknown): string => {
  if (err instanceof UploaderError) return err.message;
  if (err && typeof err === 'object') {
    const e = err as AxiosishError;
    const remote = e.response?.data?.message;
    if (typeof remote === 'string' && remote) return remote;
    if (typeof e.message === 'string' && e.message) return e.message;
  }
  if (typeof err === 'string' && err) return err;
  return String(err);
};
