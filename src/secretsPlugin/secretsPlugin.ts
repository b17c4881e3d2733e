/**
 * Requirements addressed:
 * - Provide a get-dotenv plugin mounted as `secrets` with `secrets push`.
 * - Settings expand against `{ ...process.env, ...ctx.dotenv }`.
 */

import { definePlugin } from '@karmaniverous/get-dotenv/cliHost';

import { registerPushCommand } from './commands/registerPushCommand';

export const secretsPlugin = () =>
  definePlugin({
    ns: 'secrets',
    setup(cli) {
      cli.description('GitHub Actions repository secret helpers.');
      registerPushCommand({ cli });
    },
  });
