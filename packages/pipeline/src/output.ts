import { X402Error } from './errors.js';

/**
 * JSON.stringify replacer: bigints as decimal strings, errors as plain objects.
 */
export function bigintReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof X402Error) {
    return { name: value.name, code: value.code, message: value.message };
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export function outputJson(data: unknown): void {
  console.log(JSON.stringify(data, bigintReplacer));
}

export function outputError(
  error: string,
  message: string,
  exitCode: number,
): void {
  outputJson({ ok: false, error, message });
  process.stderr.write(`[x402-pipeline] Error: ${message}\n`);
  process.exit(exitCode);
}
