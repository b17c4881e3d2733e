/**
 * Requirements addressed:
 * - Compose uploader settings from CLI flags over environment variables
 *   (`{ ...process.env, ...ctx.dotenv }`), then validate with zod.
 * - Credentials come from the environment only; no flag carries a token.
 * - `repository` supports `$VAR` expansion and must be `owner/repo`.
 */

import { z } from 'zod';

import { DEFAULT_GITHUB_API_URL } from '../githubSecrets/GithubSecretsClient';
import { TOKEN_ENV_VARS } from '../githubSecrets/secretSink';
import { DEFAULT_DEFINITION_FILE } from '../uploader/definitionFile';
import { expandValue } from './secretsUtils';

const booleanish = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((v) => v === true || v === 'true' || v === '1');

export const secretsPluginConfigSchema = z.object({
  file: z.string().min(1).default(DEFAULT_DEFINITION_FILE),
  repository: z
    .string({ required_error: 'repository is required (use --repository or GITHUB_REPOSITORY).' })
    .regex(/^[\w.-]+\/[\w.-]+$/, "repository must be 'owner/repo'."),
  sink: z.enum(['api', 'gh']).default('api'),
  token: z.string().min(1).optional(),
  apiUrl: z.string().url().default(DEFAULT_GITHUB_API_URL),
  failOnError: booleanish.default(false),
  include: z.array(z.string()).optional(),
  exclude: z.array(z.string()).optional(),
  dryRun: z.boolean().default(false),
});

export type SecretsPluginConfig = z.infer<typeof secretsPluginConfigSchema>;

/** Flags accepted by `secrets push`. */
export type PushOpts = {
  file?: string;
  repository?: string;
  sink?: string;
  apiUrl?: string;
  include?: string[];
  exclude?: string[];
  dryRun?: boolean;
  failOnError?: boolean;
};

const nonEmpty = (v: string | undefined): string | undefined =>
  v?.trim() ? v.trim() : undefined;

export const resolveToken = (
  envRef: Record<string, string | undefined>,
): string | undefined => {
  for (const k of TOKEN_ENV_VARS) {
    const v = nonEmpty(envRef[k]);
    if (v) return v;
  }
  return;
};

/**
 * Resolve push settings. Flags win over environment; environment wins over
 * defaults.
 *
 * @throws With the zod issue messages when the result is invalid.
 */
export const resolveSecretsPluginConfig = (
  opts: PushOpts,
  envRef: Record<string, string | undefined>,
): SecretsPluginConfig => {
  const repositoryRaw =
    nonEmpty(opts.repository) ?? nonEmpty(envRef.GITHUB_REPOSITORY);

  const candidate = {
    file: nonEmpty(opts.file) ?? nonEmpty(envRef.SECRETS_FILE),
    repository: repositoryRaw ? expandValue(repositoryRaw, envRef) : undefined,
    sink: nonEmpty(opts.sink) ?? nonEmpty(envRef.SECRETS_SINK),
    token: resolveToken(envRef),
    apiUrl: nonEmpty(opts.apiUrl) ?? nonEmpty(envRef.GITHUB_API_URL),
    failOnError: opts.failOnError ?? nonEmpty(envRef.SECRETS_FAIL_ON_ERROR),
    include: opts.include,
    exclude: opts.exclude,
    dryRun: opts.dryRun,
  };

  const parsed = secretsPluginConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new Error(
      parsed.error.issues
        .map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
        .join('; '),
    );
  }

  const { include, exclude } = parsed.data;
  if (include?.length && exclude?.length) {
    throw new Error('--exclude and --include are mutually exclusive.');
  }

  return parsed.data;
};
