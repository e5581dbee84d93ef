import { describe, it, expect, vi, afterEach } from 'vitest';
import { outputJson, outputError, bigintReplacer } from './output.js';
import { SpendLimitExceededError } from './errors.js';

describe('outputError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('outputs error JSON, writes to stderr, and exits', () => {
    const logSpy = vi
      .spyOn(console, 'log')
      .mockImplementation(() => {});
    const stderrSpy = vi
      .spyOn(process.stderr, 'write')
      .mockImplementation(() => true);
    const exitSpy = vi
      .spyOn(process, 'exit')
      .mockImplementation(() => undefined as never);

    outputError('test_error', 'Something went wrong', 1);

    expect(logSpy).toHaveBeenCalledWith('{"ok":false,"error":"test_error","message":"Something went wrong"}');
    expect(stderrSpy).toHaveBeenCalledWith('[x402-pipeline] Error: Something went wrong\n');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('uses correct exit code', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const exitSpy = vi
      .spyOn(process, 'exit')
      .mockImplementation(() => undefined as never);

    outputError('missing_credentials', 'No private key configured', 3);
    expect(exitSpy).toHaveBeenCalledWith(3);
  });
});

describe('outputJson', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('serializes bigints as strings', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    outputJson({ amount: 600000n });
    expect(logSpy).toHaveBeenCalledWith('{"amount":"600000"}');
  });

  it('serializes errors with their code', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = new SpendLimitExceededError('USDC', 'no_limit', '0', '0.00', '0.60', '0.00');
    outputJson({ error });
    expect(logSpy).toHaveBeenCalledWith(
      '{"error":{"name":"SpendLimitExceededError","code":"spend_limit_exceeded","message":"No spend limit configured for USDC"}}',
    );
  });
});

describe('bigintReplacer', () => {
  it('passes other values through', () => {
    expect(bigintReplacer('k', 'text')).toBe('text');
    expect(bigintReplacer('k', 12)).toBe(12);
    expect(bigintReplacer('k', null)).toBeNull();
  });
});
