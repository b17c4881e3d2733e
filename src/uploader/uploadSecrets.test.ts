import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { describe, expect, it, vi } from 'vitest';

import type { EnvEntry, PutMode } from '../githubSecrets/envEntry';
import type { SecretSink } from '../githubSecrets/secretSink';
import { UploaderError } from '../githubSecrets/uploaderError';
import { filterEntries, uploadSecrets } from './uploadSecrets';

const fixtures = path.join(
  path.dirname(fileURLToPath(import.meta.url)),
  '__fixtures__',
);

const makeLogger = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

const makeSink = (put: (entry: EnvEntry) => Promise<PutMode>) => ({
  kind: 'api' as const,
  assertReady: vi.fn<SecretSink['assertReady']>(async () => undefined),
  prepare: vi.fn<SecretSink['prepare']>(async () => undefined),
  put: vi.fn<SecretSink['put']>(put),
});

describe('uploadSecrets', () => {
  it('uploads only the well-formed line', async () => {
    const sink = makeSink(async () => 'created');
    const logger = makeLogger();

    await uploadSecrets({
      file: path.join(fixtures, 'scenario.env'),
      sink,
      logger,
    });

    expect(sink.put).toHaveBeenCalledTimes(1);
    expect(sink.put).toHaveBeenCalledWith({
      name: 'DB_URI',
      value: 'postgres://x',
    });
    expect(logger.info.mock.calls).toEqual([
      ['Secret DB_URI uploaded successfully (created).'],
      ['Done!'],
    ]);
  });

  it('keeps going after a failed entry and reports each one', async () => {
    const sink = makeSink(async ({ name }) => {
      if (name === 'BETA') {
        throw new UploaderError('UploadFailure', 'Validation Failed');
      }
      return 'updated';
    });
    const logger = makeLogger();

    const report = await uploadSecrets({
      file: path.join(fixtures, 'three.env'),
      sink,
      logger,
    });

    expect(sink.put.mock.calls.map(([e]) => e)).toEqual([
      { name: 'ALPHA', value: '1' },
      { name: 'BETA', value: 'two' },
      { name: 'GAMMA', value: '3=3' },
    ]);
    expect(logger.info.mock.calls).toEqual([
      ['Secret ALPHA uploaded successfully (updated).'],
      ['Secret GAMMA uploaded successfully (updated).'],
      ['Done!'],
    ]);
    expect(logger.error.mock.calls).toEqual([
      ['Failed to upload BETA: Validation Failed'],
    ]);
    expect(report).toEqual({
      failed: 1,
      results: [
        { name: 'ALPHA', succeeded: true, detail: '', mode: 'updated' },
        { name: 'BETA', succeeded: false, detail: 'Validation Failed' },
        { name: 'GAMMA', succeeded: true, detail: '', mode: 'updated' },
      ],
    });
  });

  it('labels encryption failures separately', async () => {
    const sink = makeSink(async () => {
      throw new UploaderError('EncryptionFailure', 'invalid key');
    });
    const logger = makeLogger();

    await uploadSecrets({
      file: path.join(fixtures, 'scenario.env'),
      sink,
      logger,
    });

    expect(logger.error).toHaveBeenCalledWith(
      'Failed to encrypt DB_URI: invalid key',
    );
    expect(logger.info).toHaveBeenLastCalledWith('Done!');
  });

  it('stops before reading or uploading when the sink is not ready', async () => {
    const sink = makeSink(async () => 'created');
    sink.assertReady.mockRejectedValueOnce(
      new UploaderError('MissingDependency', 'A GitHub token is required.'),
    );

    await expect(
      uploadSecrets({
        file: path.join(fixtures, 'three.env'),
        sink,
        logger: makeLogger(),
      }),
    ).rejects.toThrow('A GitHub token is required.');
    expect(sink.prepare).not.toHaveBeenCalled();
    expect(sink.put).not.toHaveBeenCalled();
  });

  it('stops before any remote setup when the file is missing', async () => {
    const sink = makeSink(async () => 'created');

    await expect(
      uploadSecrets({
        file: path.join(fixtures, 'missing.env'),
        sink,
        logger: makeLogger(),
      }),
    ).rejects.toMatchObject({ code: 'MissingInputFile' });
    expect(sink.prepare).not.toHaveBeenCalled();
    expect(sink.put).not.toHaveBeenCalled();
  });

  it('propagates key retrieval failures without uploading', async () => {
    const sink = makeSink(async () => 'created');
    sink.prepare.mockRejectedValueOnce(
      new UploaderError('KeyRetrievalFailure', 'Failed to retrieve public key'),
    );

    await expect(
      uploadSecrets({
        file: path.join(fixtures, 'three.env'),
        sink,
        logger: makeLogger(),
      }),
    ).rejects.toMatchObject({ code: 'KeyRetrievalFailure' });
    expect(sink.put).not.toHaveBeenCalled();
  });

  it('lists entries without touching the sink on a dry run', async () => {
    const sink = makeSink(async () => 'created');
    const logger = makeLogger();

    await uploadSecrets({
      file: path.join(fixtures, 'three.env'),
      sink,
      logger,
      dryRun: true,
      exclude: ['BETA'],
    });

    expect(sink.assertReady).not.toHaveBeenCalled();
    expect(sink.put).not.toHaveBeenCalled();
    expect(logger.info.mock.calls).toEqual([
      ['Would upload ALPHA.'],
      ['Would upload GAMMA.'],
      ['Done!'],
    ]);
  });
});

describe('filterEntries', () => {
  const entries = [
    { name: 'A', value: '1' },
    { name: 'B', value: '2' },
  ];

  it('ignores unknown names', () => {
    expect(filterEntries(entries, { include: ['B', 'NOPE'] })).toEqual([
      { name: 'B', value: '2' },
    ]);
    expect(filterEntries(entries, { exclude: ['NOPE'] })).toEqual(entries);
  });

  it('rejects include and exclude together', () => {
    expect(() =>
      filterEntries(entries, { include: ['A'], exclude: ['B'] }),
    ).toThrow('--exclude and --include are mutually exclusive.');
  });
});
