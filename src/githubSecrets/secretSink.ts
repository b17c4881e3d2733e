/**
 * Requirements addressed:
 * - One "remote secret sink" abstraction over both upload paths, selected by
 *   configuration rather than duplicated logic.
 * - `assertReady()` checks the credential/tool without touching the store;
 *   `prepare()` does any remote setup (public key fetched exactly once per
 *   run). Both raise only fatal errors.
 * - `put()` raises only per-entry errors (`EncryptionFailure`,
 *   `UploadFailure`).
 */

import type { EnvEntry, PutMode } from './envEntry';
import { type CommandRunner, GhCli } from './ghCli';
import {
  DEFAULT_GITHUB_API_URL,
  GithubSecretsClient,
  type HttpClientLike,
  type Logger,
  type RepoPublicKey,
} from './GithubSecretsClient';
import { sealSecretValue } from './sealSecret';
import { describeError, UploaderError } from './uploaderError';

export type SinkKind = 'api' | 'gh';

export interface SecretSink {
  readonly kind: SinkKind;
  /** Check the local credential or tool. Makes no request to the store. */
  assertReady(): Promise<void>;
  /** Remote setup. Must complete before any `put`. */
  prepare(): Promise<void>;
  /** Write one secret. Rejects with a per-entry `UploaderError`. */
  put(entry: EnvEntry): Promise<PutMode>;
}

/** Environment variables consulted for the REST token, in order. */
export const TOKEN_ENV_VARS = ['GITHUB_TOKEN', 'GH_TOKEN'] as const;

/**
 * Token + REST sink. Values are sealed locally against the repository
 * public key.
 */
export class GithubApiSecretSink implements SecretSink {
  readonly kind = 'api';
  readonly #repository: string;
  readonly #token: string | undefined;
  readonly #baseUrl: string;
  readonly #logger: Logger;
  readonly #http: HttpClientLike | undefined;
  #client: GithubSecretsClient | undefined;
  #publicKey: RepoPublicKey | undefined;

  constructor({
    repository,
    token,
    baseUrl = DEFAULT_GITHUB_API_URL,
    logger = console,
    http,
  }: {
    repository: string;
    token?: string;
    baseUrl?: string;
    logger?: Logger;
    http?: HttpClientLike;
  }) {
    this.#repository = repository;
    this.#token = token;
    this.#baseUrl = baseUrl;
    this.#logger = logger;
    this.#http = http;
  }

  async assertReady(): Promise<void> {
    if (!this.#token) {
      throw new UploaderError(
        'MissingDependency',
        `A GitHub token is required. Set ${TOKEN_ENV_VARS.join(' or ')}.`,
      );
    }
  }

  async prepare(): Promise<void> {
    await this.assertReady();

    const client = new GithubSecretsClient({
      repository: this.#repository,
      token: this.#token,
      baseUrl: this.#baseUrl,
      logger: this.#logger,
      ...(this.#http ? { http: this.#http } : {}),
    });

    this.#publicKey = await client.getPublicKey();
    this.#client = client;
  }

  async put({ name, value }: EnvEntry): Promise<PutMode> {
    const client = this.#client;
    const publicKey = this.#publicKey;
    if (!client || !publicKey) {
      throw new Error('prepare() must complete before put().');
    }

    let encryptedValue: string;
    try {
      encryptedValue = await sealSecretValue(value, publicKey.key);
    } catch (err) {
      throw new UploaderError('EncryptionFailure', describeError(err), {
        cause: err,
      });
    }

    return await client.putSecret({
      name,
      encryptedValue,
      keyId: publicKey.keyId,
    });
  }
}

/**
 * Authenticated `gh` session sink.
 */
export class GhCliSecretSink implements SecretSink {
  readonly kind = 'gh';
  readonly #gh: GhCli;

  constructor(opts: {
    repository: string;
    logger?: Logger;
    run?: CommandRunner;
  }) {
    this.#gh = new GhCli(opts);
  }

  async assertReady(): Promise<void> {
    await this.#gh.assertReady();
  }

  async prepare(): Promise<void> {
    // gh fetches key material itself on every `secret set`.
  }

  async put(entry: EnvEntry): Promise<PutMode> {
    return await this.#gh.setSecret(entry);
  }
}

export type SecretSinkConfig = {
  sink: SinkKind;
  repository: string;
  token?: string;
  apiUrl?: string;
};

/**
 * Build the sink named by configuration.
 *
 * `deps` carries the test seams for each sink.
 */
export const createSecretSink = (
  { sink, repository, token, apiUrl }: SecretSinkConfig,
  deps: { logger?: Logger; http?: HttpClientLike; run?: CommandRunner } = {},
): SecretSink => {
  const { logger = console, http, run } = deps;

  if (sink === 'gh') {
    return new GhCliSecretSink({ repository, logger, ...(run ? { run } : {}) });
  }

  return new GithubApiSecretSink({
    repository,
    logger,
    ...(token ? { token } : {}),
    ...(apiUrl ? { baseUrl: apiUrl } : {}),
    ...(http ? { http } : {}),
  });
};
