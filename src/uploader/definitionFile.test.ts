import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { describe, expect, it } from 'vitest';

import { isUploaderErrorCode } from '../githubSecrets/uploaderError';
import {
  parseDefinitionLine,
  parseDefinitionText,
  readDefinitionFile,
} from './definitionFile';

const fixtures = path.join(
  path.dirname(fileURLToPath(import.meta.url)),
  '__fixtures__',
);

describe('definitionFile', () => {
  it('splits on the first = and trims both sides', () => {
    expect(parseDefinitionLine('  API_KEY =  abc==def  ')).toEqual({
      name: 'API_KEY',
      value: 'abc==def',
    });
  });

  it('skips blank, comment and malformed lines', () => {
    expect(parseDefinitionLine('')).toBeUndefined();
    expect(parseDefinitionLine('   ')).toBeUndefined();
    expect(parseDefinitionLine('# A=1')).toBeUndefined();
    expect(parseDefinitionLine('  # indented comment')).toBeUndefined();
    expect(parseDefinitionLine('BAD_LINE')).toBeUndefined();
    expect(parseDefinitionLine('=value')).toBeUndefined();
    expect(parseDefinitionLine('NAME=')).toBeUndefined();
    expect(parseDefinitionLine('NAME=   ')).toBeUndefined();
  });

  it('keeps file order and tolerates CRLF', () => {
    expect(parseDefinitionText('B=2\r\nA=1\r\n')).toEqual([
      { name: 'B', value: '2' },
      { name: 'A', value: '1' },
    ]);
  });

  it('reads a definition file from disk', async () => {
    await expect(
      readDefinitionFile(path.join(fixtures, 'scenario.env')),
    ).resolves.toEqual([{ name: 'DB_URI', value: 'postgres://x' }]);
  });

  it('reports a missing file as MissingInputFile', async () => {
    const missing = path.join(fixtures, 'nope.env');
    const err = await readDefinitionFile(missing).catch((e: unknown) => e);
    expect(isUploaderErrorCode(err, 'MissingInputFile')).toBe(true);
    expect(err).toHaveProperty(
      'message',
      `Definition file '${missing}' not found or unreadable.`,
    );
  });
});
