/**
 * Requirements addressed:
 * - Provide a get-dotenv CLI alias `repo-secrets`.
 * - Keep the default get-dotenv CLI composition and mount the secrets plugin
 *   at the root: `repo-secrets secrets push`.
 */

import { createCli } from '@karmaniverous/get-dotenv/cli';
import {
  batchPlugin,
  cmdPlugin,
  initPlugin,
} from '@karmaniverous/get-dotenv/plugins';

import { secretsPlugin } from '../../secretsPlugin/secretsPlugin';

await createCli({
  alias: 'repo-secrets',
  compose: (program) =>
    program
      .use(
        cmdPlugin({ asDefault: true, optionAlias: '-c, --cmd <command...>' }),
      )
      .use(batchPlugin())
      .use(secretsPlugin())
      .use(initPlugin()),
})();
