import { describe, it, expect } from 'vitest';
import { ConfigError, IpcError, LauncherError, UsageError } from '@swiftlaunch/shared';
import { encodeMessage, fromErrorBody, parseRequest, toErrorBody } from './protocol';

describe('parseRequest', () => {
  it('accepts a well-formed request', () => {
    expect(parseRequest('{"id":4,"type":"input","sessionId":"w1","query":"fi"}')).toEqual({
      success: true,
      request: { id: 4, type: 'input', sessionId: 'w1', query: 'fi' },
    });
  });

  it('answers a line that is not JSON without an id', () => {
    const parsed = parseRequest('not json');

    expect(parsed.success).toBe(false);
    if (parsed.success) return;
    expect(parsed.id).toBeNull();
    expect(parsed.error).toBeInstanceOf(IpcError);
    expect(parsed.error.message).toBe('Request is not valid JSON');
  });

  it('keeps the id of a request with bad fields', () => {
    const parsed = parseRequest('{"id":7,"type":"input","sessionId":"w1"}');

    expect(parsed).toMatchObject({ success: false, id: 7 });
    expect(!parsed.success && parsed.error.message).toBe('Invalid request: query: Required');
  });

  it('rejects unknown request types', () => {
    const parsed = parseRequest('{"id":3,"type":"launch"}');

    expect(parsed).toMatchObject({ success: false, id: 3 });
    expect(!parsed.success && parsed.error.message).toMatch(/^Invalid request: type: Invalid discriminator value/);
  });
});

describe('error bodies', () => {
  it('carries the code and details of launcher errors', () => {
    const error = new ConfigError('Configuration validation failed', { details: { path: 'fanout.deadlineMs' } });

    expect(toErrorBody(error)).toEqual({
      code: 'ConfigError',
      message: 'Configuration validation failed',
      details: { path: 'fanout.deadlineMs' },
    });
    expect(toErrorBody(new Error('boom'))).toEqual({ code: 'UnknownError', message: 'boom' });
  });

  it('rebuilds a launcher error on the client side', () => {
    const error = fromErrorBody(toErrorBody(new UsageError('Unknown session w1')));

    expect(error).toBeInstanceOf(LauncherError);
    expect(error.code).toBe('UsageError');
    expect(error.message).toBe('Unknown session w1');
  });
});

describe('encodeMessage', () => {
  it('writes one line per message', () => {
    expect(encodeMessage({ id: 1, type: 'ping' })).toBe('{"id":1,"type":"ping"}\n');
  });
});
