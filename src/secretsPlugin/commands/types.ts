/**
 * Requirements addressed:
 * - Keep command registration modules typed without importing get-dotenv
 *   internal CLI generic types.
 * - Avoid `any`; action handlers declare their own option shapes.
 */

import type { SecretsCtx } from '../secretsPluginCtx';

export type SecretsPluginCommand = {
  description: (desc: string) => SecretsPluginCommand;
  command: (name: string) => SecretsPluginCommand;
  option: (
    flags: string,
    description: string,
    defaultValue?: string | boolean,
  ) => SecretsPluginCommand;
  action: (fn: (...args: never[]) => unknown) => SecretsPluginCommand;
};

export type SecretsPluginCli = SecretsPluginCommand & {
  getCtx: () => SecretsCtx;
};
