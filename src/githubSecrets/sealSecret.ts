/**
 * Requirements addressed:
 * - Encrypt each value client-side against the repository public key so the
 *   store never receives plaintext (libsodium sealed box, base64 in and out).
 */

import { sodium } from './sodium';

/**
 * Seal a secret value for the GitHub Actions secrets API.
 *
 * @param publicKey Base64 (original variant) repository public key.
 * @returns Base64 sealed box.
 * @throws If the key does not decode to a valid curve25519 public key.
 */
export const sealSecretValue = async (
  value: string,
  publicKey: string,
): Promise<string> => {
  await sodium.ready;

  const key = sodium.from_base64(publicKey, sodium.base64_variants.ORIGINAL);
  if (key.length !== sodium.crypto_box_PUBLICKEYBYTES) {
    throw new Error(
      `public key must be ${String(sodium.crypto_box_PUBLICKEYBYTES)} bytes, got ${String(key.length)}.`,
    );
  }

  const sealed = sodium.crypto_box_seal(sodium.from_string(value), key);
  return sodium.to_base64(sealed, sodium.base64_variants.ORIGINAL);
};
