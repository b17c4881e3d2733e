/**
 * Requirements addressed:
 * - Define the minimal host ctx surface relied on by `secrets` commands,
 *   without taking a dependency on get-dotenv internal ctx types.
 */

export type SecretsCtx = {
  /** Dotenv state loaded by the host (`.env`, `.env.local`, ...). */
  dotenv: Record<string, string | undefined>;
};
