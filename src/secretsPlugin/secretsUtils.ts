/**
 * Requirements addressed:
 * - Settings expand against `{ ...process.env, ...ctx.dotenv }` so tokens and
 *   repository names can live in git-ignored private dotenv files.
 */

import { dotenvExpand } from '@karmaniverous/get-dotenv';

export const buildExpansionEnv = (
  ctxDotenv: Record<string, string | undefined>,
): Record<string, string | undefined> => ({
  ...process.env,
  ...ctxDotenv,
});

export const expandValue = (
  raw: string,
  envRef: Record<string, string | undefined>,
): string => dotenvExpand(raw, envRef) ?? raw;
