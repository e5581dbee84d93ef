/**
 * JSON pipeline definitions for the CLI.
 *
 *   {
 *     "steps": [
 *       { "name": "search", "url": "https://api.example.com/search?q=x402", "output": "results.0" },
 *       { "name": "summary", "method": "POST", "url": "https://api.example.com/summarize",
 *         "body": { "text": "{{search.title}}" } }
 *     ]
 *   }
 *
 * `{{step.path}}` refers to an earlier step's output. A string that is exactly
 * one template takes the referenced value as is; templates inside a longer
 * string are interpolated (non-strings as JSON).
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { StepContext, StepSpec } from './pipeline.js';
import type { PaymentRequest } from './types.js';

const stepSchema = z.object({
  name: z.string().min(1),
  method: z.string().min(1).optional(),
  url: z.string().min(1),
  headers: z.record(z.string()).optional(),
  body: z.unknown().optional(),
  output: z.string().min(1).optional(),
});

const pipelineFileSchema = z.object({
  steps: z.array(stepSchema).min(1),
});

export type PipelineFileStep = z.infer<typeof stepSchema>;
export type PipelineFile = z.infer<typeof pipelineFileSchema>;

const TEMPLATE = /\{\{\s*([^}]+?)\s*\}\}/g;
const WHOLE_TEMPLATE = /^\{\{\s*([^}]+?)\s*\}\}$/;

export function parsePipelineFile(data: unknown): PipelineFile {
  const parsed = pipelineFileSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ConfigError(`Invalid pipeline file${where}: ${issue?.message ?? 'unknown error'}`);
  }
  return parsed.data;
}

export function loadPipelineFile(filePath: string): PipelineFile {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error: unknown) {
    throw new ConfigError(`Cannot read pipeline file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(text) as unknown;
  } catch {
    throw new ConfigError(`Pipeline file ${filePath} is not valid JSON`);
  }
  return parsePipelineFile(data);
}

export function toStepSpecs(file: PipelineFile): StepSpec[] {
  return file.steps.map((step) => ({
    name: step.name,
    request: (ctx: StepContext) => buildRequest(step, ctx.outputs),
    output: step.output === undefined
      ? undefined
      : (payload: unknown) => selectPath(payload, step.output ?? ''),
  }));
}

/**
 * Read a dotted path (`a.b.0.c`) from a JSON value.
 *
 * @throws Error when a segment is missing
 */
export function selectPath(value: unknown, path: string): unknown {
  let current = value;
  for (const segment of path.split('.')) {
    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      const index = Number(segment);
      if (index >= current.length) {
        throw new Error(`path "${path}" has no element ${segment}`);
      }
      current = current[index];
    } else if (isRecord(current) && Object.hasOwn(current, segment)) {
      current = current[segment];
    } else {
      throw new Error(`path "${path}" not found (missing "${segment}")`);
    }
  }
  return current;
}

export function resolveTemplates(value: unknown, outputs: Readonly<Record<string, unknown>>): unknown {
  if (typeof value === 'string') {
    return resolveString(value, outputs);
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveTemplates(item, outputs));
  }
  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, resolveTemplates(v, outputs)]),
    );
  }
  return value;
}

// -- Internal Helpers ---

function buildRequest(step: PipelineFileStep, outputs: Readonly<Record<string, unknown>>): PaymentRequest {
  const url = stringify(resolveString(step.url, outputs, encodeURIComponent));
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(step.headers ?? {})) {
    headers[name] = stringify(resolveString(value, outputs));
  }

  let body: string | undefined;
  if (step.body !== undefined) {
    const resolved = resolveTemplates(step.body, outputs);
    if (typeof resolved === 'string') {
      body = resolved;
    } else {
      body = JSON.stringify(resolved);
      if (!Object.keys(headers).some((h) => h.toLowerCase() === 'content-type')) {
        headers['Content-Type'] = 'application/json';
      }
    }
  }

  return {
    url,
    method: step.method ?? (body === undefined ? 'GET' : 'POST'),
    headers,
    body,
  };
}

/**
 * A whole-string template yields the raw value. Templates inside a longer
 * string are stringified and passed through `encode`, which for URLs
 * percent-encodes each interpolated value.
 */
function resolveString(
  text: string,
  outputs: Readonly<Record<string, unknown>>,
  encode: (value: string) => string = (value) => value,
): unknown {
  const whole = WHOLE_TEMPLATE.exec(text);
  if (whole?.[1]) {
    return lookup(whole[1], outputs);
  }
  return text.replace(TEMPLATE, (_match, ref: string) => encode(stringify(lookup(ref, outputs))));
}

function lookup(ref: string, outputs: Readonly<Record<string, unknown>>): unknown {
  const [stepName = '', ...rest] = ref.split('.');
  if (!Object.hasOwn(outputs, stepName)) {
    throw new Error(`template "{{${ref}}}" refers to unknown step "${stepName}"`);
  }
  const output = outputs[stepName];
  return rest.length === 0 ? output : selectPath(output, rest.join('.'));
}

function stringify(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value) ?? '';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
