/**
 * Requirements addressed:
 * - Check the sink's credential/tool first, then the definition file, then
 *   do remote setup; any of these failing aborts before the first upload.
 * - Upload entries sequentially, one at a time, with no retries.
 * - Per-entry failures are logged and skipped; the run always continues and
 *   ends with a single completion notice.
 * - Return a report so callers can decide on an exit status.
 */

import { tryit } from 'radash';

import type { EnvEntry, PutMode } from '../githubSecrets/envEntry';
import type { Logger } from '../githubSecrets/GithubSecretsClient';
import type { SecretSink } from '../githubSecrets/secretSink';
import {
  describeError,
  isUploaderErrorCode,
} from '../githubSecrets/uploaderError';
import { readDefinitionFile } from './definitionFile';

export type UploadResult = {
  name: string;
  succeeded: boolean;
  /** Failure detail; empty on success. */
  detail: string;
  mode?: PutMode;
};

export type UploadReport = {
  results: UploadResult[];
  failed: number;
};

export type UploadSecretsOptions = {
  /** Path to the definition file. */
  file: string;
  sink: SecretSink;
  logger?: Logger;
  /** Only upload these names (unknown names are ignored). */
  include?: string[];
  /** Skip these names (unknown names are ignored). */
  exclude?: string[];
  /** Parse and list entries without contacting the store. */
  dryRun?: boolean;
};

export const filterEntries = (
  entries: EnvEntry[],
  { include, exclude }: { include?: string[]; exclude?: string[] },
): EnvEntry[] => {
  if (include?.length && exclude?.length) {
    throw new Error('--exclude and --include are mutually exclusive.');
  }
  if (include?.length) {
    const keep = new Set(include);
    return entries.filter((e) => keep.has(e.name));
  }
  if (exclude?.length) {
    const drop = new Set(exclude);
    return entries.filter((e) => !drop.has(e.name));
  }
  return entries;
};

/**
 * Publish every entry of a definition file through a secret sink.
 *
 * @throws Fatal `UploaderError`s only (`MissingDependency`,
 * `MissingInputFile`, `KeyRetrievalFailure`).
 */
export const uploadSecrets = async ({
  file,
  sink,
  logger = console,
  include,
  exclude,
  dryRun = false,
}: UploadSecretsOptions): Promise<UploadReport> => {
  if (!dryRun) await sink.assertReady();

  const entries = filterEntries(await readDefinitionFile(file), {
    include,
    exclude,
  });

  if (dryRun) {
    for (const { name } of entries) logger.info(`Would upload ${name}.`);
    logger.info('Done!');
    return { results: [], failed: 0 };
  }

  await sink.prepare();

  const put = tryit((entry: EnvEntry) => sink.put(entry));
  const results: UploadResult[] = [];

  for (const entry of entries) {
    const [err, mode] = await put(entry);

    if (err) {
      const detail = describeError(err);
      logger.error(
        isUploaderErrorCode(err, 'EncryptionFailure')
          ? `Failed to encrypt ${entry.name}: ${detail}`
          : `Failed to upload ${entry.name}: ${detail}`,
      );
      results.push({ name: entry.name, succeeded: false, detail });
      continue;
    }

    logger.info(`Secret ${entry.name} uploaded successfully (${mode}).`);
    results.push({ name: entry.name, succeeded: true, detail: '', mode });
  }

  logger.info('Done!');

  return {
    results,
    failed: results.filter((r) => !r.succeeded).length,
  };
};
