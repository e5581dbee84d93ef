import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  loadPipelineFile,
  parsePipelineFile,
  resolveTemplates,
  selectPath,
  toStepSpecs,
} from './pipeline-file.js';
import { ConfigError } from './errors.js';

describe('parsePipelineFile', () => {
  it('should accept a minimal pipeline', () => {
    const file = parsePipelineFile({ steps: [{ name: 'one', url: 'https://api.example.com/one' }] });
    expect(file.steps).toEqual([{ name: 'one', url: 'https://api.example.com/one' }]);
  });

  it('should reject a pipeline without steps', () => {
    expect(() => parsePipelineFile({ steps: [] }))
      .toThrow(new ConfigError('Invalid pipeline file at steps: Array must contain at least 1 element(s)'));
  });

  it('should name the offending field', () => {
    expect(() => parsePipelineFile({ steps: [{ name: 'one' }] }))
      .toThrow('Invalid pipeline file at steps.0.url: Required');
  });
});

describe('loadPipelineFile', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipeline-file-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should read and validate a JSON file', () => {
    const filePath = path.join(tmpDir, 'pipeline.json');
    fs.writeFileSync(filePath, JSON.stringify({ steps: [{ name: 'a', url: 'https://api.example.com/a' }] }));

    expect(loadPipelineFile(filePath).steps).toHaveLength(1);
  });

  it('should reject invalid JSON', () => {
    const filePath = path.join(tmpDir, 'broken.json');
    fs.writeFileSync(filePath, '{ steps: ');

    expect(() => loadPipelineFile(filePath)).toThrow(new ConfigError(`Pipeline file ${filePath} is not valid JSON`));
  });

  it('should reject a missing file', () => {
    expect(() => loadPipelineFile(path.join(tmpDir, 'missing.json'))).toThrow(ConfigError);
  });
});

describe('selectPath', () => {
  const value = { results: [{ title: 'first' }, { title: 'second' }], meta: { count: 2 } };

  it('should walk objects and arrays', () => {
    expect(selectPath(value, 'results.1.title')).toBe('second');
    expect(selectPath(value, 'meta')).toEqual({ count: 2 });
  });

  it('should name the missing segment', () => {
    expect(() => selectPath(value, 'meta.total')).toThrow('path "meta.total" not found (missing "total")');
  });

  it('should reject an index past the end', () => {
    expect(() => selectPath(value, 'results.5')).toThrow('path "results.5" has no element 5');
  });
});

describe('resolveTemplates', () => {
  const outputs = { search: { title: 'x402', ids: [3, 4] }, count: 7 };

  it('should substitute a whole-string template with the raw value', () => {
    expect(resolveTemplates('{{ search.ids }}', outputs)).toEqual([3, 4]);
    expect(resolveTemplates('{{count}}', outputs)).toBe(7);
  });

  it('should interpolate templates inside longer strings', () => {
    expect(resolveTemplates('about {{search.title}} ({{count}})', outputs)).toBe('about x402 (7)');
    expect(resolveTemplates('ids={{search.ids}}', outputs)).toBe('ids=[3,4]');
  });

  it('should resolve nested structures', () => {
    expect(resolveTemplates({ q: '{{search.title}}', list: ['{{count}}', 1] }, outputs))
      .toEqual({ q: 'x402', list: [7, 1] });
  });

  it('should reject references to unknown steps', () => {
    expect(() => resolveTemplates('{{later.value}}', outputs))
      .toThrow('template "{{later.value}}" refers to unknown step "later"');
  });
});

describe('toStepSpecs', () => {
  it('should build a JSON POST from an object body', async () => {
    const [step] = toStepSpecs(parsePipelineFile({
      steps: [{ name: 'sum', url: 'https://api.example.com/sum?q={{search.title}}', body: { text: '{{search.title}}' } }],
    }));

    const request = await step?.request({ outputs: { search: { title: 'hello' } }, index: 0 });

    expect(request).toEqual({
      url: 'https://api.example.com/sum?q=hello',
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"text":"hello"}',
    });
  });

  it('should percent-encode values interpolated into the URL only', async () => {
    const [step] = toStepSpecs(parsePipelineFile({
      steps: [{
        name: 'find',
        url: 'https://api.example.com/items/{{search.id}}?q={{search.title}}',
        headers: { 'X-Title': '{{search.title}}' },
        body: { text: 'about {{search.title}}' },
      }],
    }));

    const request = await step?.request({ outputs: { search: { id: 'a/b', title: 'a&b #c' } }, index: 0 });

    expect(request).toEqual({
      url: 'https://api.example.com/items/a%2Fb?q=a%26b%20%23c',
      method: 'POST',
      headers: { 'X-Title': 'a&b #c', 'Content-Type': 'application/json' },
      body: '{"text":"about a&b #c"}',
    });
  });

  it('should leave a whole-string URL template as the raw value', async () => {
    const [step] = toStepSpecs(parsePipelineFile({ steps: [{ name: 'next', url: '{{page.next}}' }] }));

    const request = await step?.request({
      outputs: { page: { next: 'https://api.example.com/items?cursor=a&b' } },
      index: 0,
    });

    expect(request?.url).toBe('https://api.example.com/items?cursor=a&b');
  });

  it('should keep an explicit method and content type', async () => {
    const [step] = toStepSpecs(parsePipelineFile({
      steps: [{
        name: 'put',
        method: 'PUT',
        url: 'https://api.example.com/item',
        headers: { 'content-type': 'application/merge-patch+json' },
        body: { a: 1 },
      }],
    }));

    const request = await step?.request({ outputs: {}, index: 0 });

    expect(request).toEqual({
      url: 'https://api.example.com/item',
      method: 'PUT',
      headers: { 'content-type': 'application/merge-patch+json' },
      body: '{"a":1}',
    });
  });

  it('should default to GET without a body', async () => {
    const [step] = toStepSpecs(parsePipelineFile({ steps: [{ name: 'get', url: 'https://api.example.com/x' }] }));

    expect(await step?.request({ outputs: {}, index: 0 }))
      .toEqual({ url: 'https://api.example.com/x', method: 'GET', headers: {}, body: undefined });
  });

  it('should extract the configured output path', () => {
    const [step] = toStepSpecs(parsePipelineFile({
      steps: [{ name: 'get', url: 'https://api.example.com/x', output: 'data.0' }],
    }));

    expect(step?.output?.({ data: ['first'] }, { outputs: {}, index: 0 })).toBe('first');
  });

  it('should use the whole payload when no output path is set', () => {
    const [step] = toStepSpecs(parsePipelineFile({ steps: [{ name: 'get', url: 'https://api.example.com/x' }] }));
    expect(step?.output).toBeUndefined();
  });
});
