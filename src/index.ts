/**
 * This is the main entry point for the library.
 *
 * @packageDocumentation
 */

/**
 * Requirements addressed:
 * - Export the uploader, both secret sinks and the REST client.
 * - Export the get-dotenv `secretsPlugin` for mounting in other CLIs.
 */

export type { EnvEntry, PutMode } from './githubSecrets/envEntry';
export {
  type CommandRunner,
  GhCli,
  type RunResult,
} from './githubSecrets/ghCli';
export {
  GithubSecretsClient,
  type GithubSecretsClientOptions,
  type HttpClientLike,
  type Logger,
  type RepoPublicKey,
} from './githubSecrets/GithubSecretsClient';
export { sealSecretValue } from './githubSecrets/sealSecret';
export {
  createSecretSink,
  GhCliSecretSink,
  GithubApiSecretSink,
  type SecretSink,
  type SecretSinkConfig,
  type SinkKind,
} from './githubSecrets/secretSink';
export {
  describeError,
  isFatalUploaderError,
  UploaderError,
  type UploaderErrorCode,
} from './githubSecrets/uploaderError';
export {
  parseDefinitionLine,
  parseDefinitionText,
  readDefinitionFile,
} from './uploader/definitionFile';
export {
  type UploadReport,
  type UploadResult,
  uploadSecrets,
  type UploadSecretsOptions,
} from './uploader/uploadSecrets';
export { secretsPlugin } from './secretsPlugin/secretsPlugin';
