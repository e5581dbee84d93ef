import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';

const CONFIG_DIR_NAME = '.x402-pipeline';

/**
 * `~/.x402-pipeline`, created owner-only on first use.
 */
export function getConfigDir(): string {
  const configDir = path.join(os.homedir(), CONFIG_DIR_NAME);

  if (!fs.existsSync(configDir)) {
    fs.mkdirSync(configDir, { mode: 0o700, recursive: true });
  }

  return configDir;
}

/**
 * Parsed JSON from the config dir, or null when the file does not exist.
 * Callers validate the shape.
 */
export function readJsonFile(filename: string): unknown {
  const filePath = path.join(getConfigDir(), filename);

  if (!fs.existsSync(filePath)) {
    return null;
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  return JSON.parse(content) as unknown;
}

export function writeJsonFile(filename: string, data: unknown): void {
  const filePath = path.join(getConfigDir(), filename);
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2), { mode: 0o600 });
}

export function appendJsonlFile(filename: string, entry: unknown): void {
  const filePath = path.join(getConfigDir(), filename);
  fs.appendFileSync(filePath, JSON.stringify(entry) + '\n', { mode: 0o600 });
}

/**
 * Every line of a JSONL file, parsed. Blank lines are skipped.
 */
export function readJsonlFile(filename: string): unknown[] {
  const filePath = path.join(getConfigDir(), filename);

  if (!fs.existsSync(filePath)) {
    return [];
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  const lines = content.split('\n').filter((l: string) => l.trim().length > 0);

  return lines.map((l: string) => JSON.parse(l) as unknown);
}
