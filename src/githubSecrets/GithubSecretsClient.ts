/**
 * Requirements addressed:
 * - Provide a public `GithubSecretsClient` over the GitHub Actions repository
 *   secrets REST API.
 * - Fetch the repository public key (`key`, `key_id`); empty material or a
 *   failed fetch is a `KeyRetrievalFailure`.
 * - Create/update a secret from an already-sealed value; 201 is `created`,
 *   204 is `updated`, anything else is an `UploadFailure` carrying the
 *   remote detail.
 * - The token is supplied by the caller and only ever sent as a header.
 */

import axios from 'axios';

import type { PutMode } from './envEntry';
import { describeError, UploaderError } from './uploaderError';

/** Console-like logger contract used across this package. */
export type Logger = Pick<Console, 'debug' | 'error' | 'info' | 'warn'>;

type HttpResponseLike = { status: number; statusText?: string; data: unknown };

/**
 * Minimal axios-like surface used by the client. An `AxiosInstance` satisfies
 * it; tests inject a fake.
 */
export type HttpClientLike = {
  get: (url: string) => Promise<HttpResponseLike>;
  put: (url: string, body: unknown) => Promise<HttpResponseLike>;
};

export type GithubSecretsClientOptions = {
  /** Target repository as `owner/repo`. */
  repository: string;
  /** Token with write access to the repository's Actions secrets. */
  token?: string;
  /** REST API root. Defaults to `https://api.github.com`. */
  baseUrl?: string;
  /** Logger instance (debug/info/warn/error). Defaults to `console`. */
  logger?: Logger;
  /**
   * Injection seam for tests. If provided, token/baseUrl are not used to
   * build a client.
   */
  http?: HttpClientLike;
};

/** Repository public key material used to seal secret values. */
export type RepoPublicKey = {
  key: string;
  keyId: string;
};

export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';

export const assertLogger = (candidate: unknown): Logger => {
  if (!candidate || typeof candidate !== 'object') {
    throw new Error(
      'logger must be an object with debug, info, warn, and error methods',
    );
  }
  const logger = candidate as Partial<Logger>;
  if (
    typeof logger.debug !== 'function' ||
    typeof logger.info !== 'function' ||
    typeof logger.warn !== 'function' ||
    typeof logger.error !== 'function'
  ) {
    throw new Error(
      'logger must implement debug, info, warn, and error methods; wrap/proxy your logger if needed',
    );
  }
  return logger as Logger;
};

export const splitRepository = (
  repository: string,
): { owner: string; repo: string } => {
  const match = /^([\w.-]+)\/([\w.-]+)$/.exec(repository.trim());
  if (!match?.[1] || !match[2]) {
    throw new Error(`repository must be 'owner/repo', got '${repository}'.`);
  }
  return { owner: match[1], repo: match[2] };
};

const readString = (data: unknown, key: string): string | undefined => {
  if (!data || typeof data !== 'object') return;
  const v = (data as Record<string, unknown>)[key];
  return typeof v === 'string' ? v : undefined;
};

const describeResponse = (res: HttpResponseLike): string =>
  readString(res.data, 'message') ??
  (res.statusText
    ? `${String(res.status)} ${res.statusText}`
    : `HTTP ${String(res.status)}`);

/**
 * GitHub Actions repository secrets client.
 *
 * Requests never throw on HTTP status; every response is classified here.
 */
export class GithubSecretsClient {
  readonly #logger: Logger;
  readonly #http: HttpClientLike;
  readonly #basePath: string;

  constructor({
    repository,
    token,
    baseUrl = DEFAULT_GITHUB_API_URL,
    logger = console,
    http,
  }: GithubSecretsClientOptions) {
    this.#logger = assertLogger(logger);

    const { owner, repo } = splitRepository(repository);
    this.#basePath = `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/actions/secrets`;

    if (http) {
      this.#http = http;
      return;
    }

    if (!token) throw new Error('token is required');

    this.#http = axios.create({
      baseURL: baseUrl,
      headers: {
        Accept: 'application/vnd.github+json',
        Authorization: `Bearer ${token}`,
        'X-GitHub-Api-Version': '2022-11-28',
      },
      validateStatus: () => true,
    });
  }

  /**
   * Fetch the repository public key used to seal secret values.
   *
   * @throws `KeyRetrievalFailure` if the request fails or returns empty
   * key material.
   */
  async getPublicKey(): Promise<RepoPublicKey> {
    this.#logger.debug('Getting repository public key...', {
      path: this.#basePath,
    });

    let res: HttpResponseLike;
    try {
      res = await this.#http.get(`${this.#basePath}/public-key`);
    } catch (err) {
      throw new UploaderError(
        'KeyRetrievalFailure',
        `Failed to retrieve public key: ${describeError(err)}`,
        { cause: err },
      );
    }

    if (res.status < 200 || res.status >= 300) {
      throw new UploaderError(
        'KeyRetrievalFailure',
        `Failed to retrieve public key: ${describeResponse(res)}`,
      );
    }

    const key = readString(res.data, 'key');
    const keyId = readString(res.data, 'key_id');
    if (!key || !keyId) {
      throw new UploaderError(
        'KeyRetrievalFailure',
        'Failed to retrieve public key or key_id. Check your token or repo access.',
      );
    }

    return { key, keyId };
  }

  /**
   * Create or update a repository secret from a sealed value.
   *
   * @returns `'created'` on 201; `'updated'` on 204.
   * @throws `UploadFailure` with the remote detail on any other outcome.
   */
  async putSecret({
    name,
    encryptedValue,
    keyId,
  }: {
    name: string;
    encryptedValue: string;
    keyId: string;
  }): Promise<PutMode> {
    if (!name) throw new Error('name is required');

    this.#logger.debug('Putting secret...', { name, keyId });

    let res: HttpResponseLike;
    try {
      res = await this.#http.put(
        `${this.#basePath}/${encodeURIComponent(name)}`,
        { encrypted_value: encryptedValue, key_id: keyId },
      );
    } catch (err) {
      throw new UploaderError('UploadFailure', describeError(err), {
        cause: err,
      });
    }

    if (res.status === 201) return 'created';
    if (res.status === 204) return 'updated';

    throw new UploaderError('UploadFailure', describeResponse(res));
  }
}
