/**
 * Stderr logger for human-readable status messages.
 *
 * All messages go to stderr so stdout remains JSON-only.
 * Never pass key material or API credentials to it.
 */

/**
 * Write a prefixed log message to stderr.
 *
 * @param message - Human-readable message (no newline needed)
 */
export function log(message: string): void {
  process.stderr.write(`[x402-pipeline] ${message}\n`);
}
