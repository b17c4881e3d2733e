/**
 * libsodium-wrappers, loaded through its CommonJS entry: the package's ESM
 * entry imports a `libsodium.mjs` file it does not ship.
 */

import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);

export const sodium: typeof import('libsodium-wrappers') =
  require('libsodium-wrappers');
