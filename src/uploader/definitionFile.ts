/**
 * Requirements addressed:
 * - Definition files are line-oriented `NAME=VALUE` text.
 * - Blank lines and `#` comments are ignored.
 * - Split on the first `=` and trim both sides; a line with either side
 *   empty (or no `=` at all) is skipped silently.
 * - A missing file is a fatal `MissingInputFile`.
 */

import fs from 'node:fs/promises';

import type { EnvEntry } from '../githubSecrets/envEntry';
import { UploaderError } from '../githubSecrets/uploaderError';

export const DEFAULT_DEFINITION_FILE = 'secrets.env';

export const parseDefinitionLine = (line: string): EnvEntry | undefined => {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith('#')) return;

  const eq = trimmed.indexOf('=');
  if (eq < 0) return;

  const name = trimmed.slice(0, eq).trim();
  const value = trimmed.slice(eq + 1).trim();
  if (!name || !value) return;

  return { name, value };
};

export const parseDefinitionText = (text: string): EnvEntry[] =>
  text.split(/\r?\n/).flatMap((line) => {
    const entry = parseDefinitionLine(line);
    return entry ? [entry] : [];
  });

/**
 * Read and parse a definition file.
 *
 * @throws `MissingInputFile` when the path does not exist.
 */
export const readDefinitionFile = async (path: string): Promise<EnvEntry[]> => {
  let text: string;
  try {
    text = await fs.readFile(path, 'utf8');
  } catch (err) {
    throw new UploaderError(
      'MissingInputFile',
      `Definition file '${path}' not found or unreadable.`,
      { cause: err },
    );
  }
  return parseDefinitionText(text);
};
