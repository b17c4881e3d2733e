/**
 * Requirements addressed:
 * - Provide `secrets push`: upload every `NAME=VALUE` line of a definition
 *   file as a GitHub Actions repository secret.
 * - With no flags, read `secrets.env` from the working directory and take
 *   the repository and token from the environment.
 * - No flag accepts a token.
 */

import { createSecretSink } from '../../githubSecrets/secretSink';
import { isFatalUploaderError } from '../../githubSecrets/uploaderError';
import { DEFAULT_DEFINITION_FILE } from '../../uploader/definitionFile';
import { uploadSecrets } from '../../uploader/uploadSecrets';
import {
  type PushOpts,
  resolveSecretsPluginConfig,
} from '../secretsPluginConfig';
import { buildExpansionEnv } from '../secretsUtils';
import {
  describeDefault,
  EXIT_FATAL,
  exitCodeForReport,
} from './commandUtils';
import type { SecretsPluginCli } from './types';

export const registerPushCommand = ({ cli }: { cli: unknown }): void => {
  const c = cli as SecretsPluginCli;

  c.command('push')
    .description(
      'Upload NAME=VALUE lines from a definition file as repository secrets.',
    )
    .option(
      '-f, --file <path>',
      `definition file ${describeDefault(DEFAULT_DEFINITION_FILE, 'SECRETS_FILE')}`,
    )
    .option(
      '-r, --repository <owner/repo>',
      'target repository, supports $VAR expansion (default: $GITHUB_REPOSITORY)',
    )
    .option(
      '--sink <api|gh>',
      `upload via token + REST API or an authenticated gh session ${describeDefault('api', 'SECRETS_SINK')}`,
    )
    .option(
      '--api-url <url>',
      `REST API root ${describeDefault('https://api.github.com', 'GITHUB_API_URL')}`,
    )
    .option(
      '-i, --include <strings...>',
      'space-delimited list of secret names to upload (conflicts with --exclude)',
    )
    .option(
      '-e, --exclude <strings...>',
      'space-delimited list of secret names to skip (conflicts with --include)',
    )
    .option('--dry-run', 'list entries without uploading')
    .option(
      '--fail-on-error',
      'exit with code 2 when any secret fails to upload',
    )
    .action(async (opts: PushOpts) => {
      const logger = console;
      const envRef = buildExpansionEnv(c.getCtx().dotenv);
      const cfg = resolveSecretsPluginConfig(opts, envRef);

      const sink = createSecretSink(cfg, { logger });

      logger.info(
        cfg.dryRun
          ? `Dry run: listing secrets from '${cfg.file}' for ${cfg.repository}; nothing will be uploaded.`
          : `Uploading secrets from '${cfg.file}' to ${cfg.repository} via ${cfg.sink}...`,
      );

      try {
        const report = await uploadSecrets({
          file: cfg.file,
          sink,
          logger,
          include: cfg.include,
          exclude: cfg.exclude,
          dryRun: cfg.dryRun,
        });
        process.exitCode = exitCodeForReport(report, cfg.failOnError);
      } catch (err) {
        if (!isFatalUploaderError(err)) throw err;
        logger.error(err instanceof Error ? err.message : String(err));
        process.exitCode = EXIT_FATAL;
      }
    });
};
