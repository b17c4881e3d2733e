/**
 * One parsed `NAME=VALUE` line from a definition file. Both fields are
 * trimmed and non-empty.
 */
export type EnvEntry = {
  name: string;
  value: string;
};

/** Outcome of a single accepted secret write. */
export type PutMode = 'created' | 'updated';
