/**
 * Requirements addressed:
 * - Fatal uploader errors print their message and exit 1.
 * - Partial upload failures exit 0 unless `--fail-on-error` is set (exit 2).
 */

import type { UploadReport } from '../../uploader/uploadSecrets';

export const EXIT_FATAL = 1;
export const EXIT_PARTIAL_FAILURE = 2;

export const exitCodeForReport = (
  report: UploadReport,
  failOnError: boolean,
): number => (failOnError && report.failed > 0 ? EXIT_PARTIAL_FAILURE : 0);

/** Render an env-backed default for option help text. */
export const describeDefault = (def: string, envVar?: string): string =>
  envVar ? `(default: $${envVar} or ${def})` : `(default: ${def})`;
