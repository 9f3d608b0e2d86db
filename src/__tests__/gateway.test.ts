import { describe, it, expect, vi } from 'vitest';
import { APIConnectionError, APIConnectionTimeoutError, APIError, APIUserAbortError } from 'openai';
import { classifyGatewayError, CompletionGateway, type SendOptions } from '../generation/gateway.js';
import { PipelineAbortedError } from '../runner/errors.js';

const OPTIONS: SendOptions = { timeoutMs: 1000, maxTokens: 50 };

describe('classifyGatewayError', () => {
  it('classifies HTTP errors as service errors with their status', () => {
    expect(classifyGatewayError(new APIError(503, undefined, 'Service Unavailable', undefined))).toEqual({
      kind: 'service',
      message: '503 Service Unavailable',
      status: 503,
    });
  });

  it('classifies timeouts and connection failures as network errors', () => {
    expect(classifyGatewayError(new APIConnectionTimeoutError())).toEqual({
      kind: 'network',
      message: 'request timed out',
    });
    expect(classifyGatewayError(new APIConnectionError({ message: 'socket hang up' }))).toEqual({
      kind: 'network',
      message: 'socket hang up',
    });
  });

  it('does not classify user aborts', () => {
    expect(classifyGatewayError(new APIUserAbortError())).toBeNull();
    expect(classifyGatewayError(Object.assign(new Error('aborted'), { name: 'AbortError' }))).toBeNull();
  });

  it('treats anything else as a network error', () => {
    expect(classifyGatewayError(new Error('ECONNRESET'))).toEqual({ kind: 'network', message: 'ECONNRESET' });
    expect(classifyGatewayError('weird')).toEqual({ kind: 'network', message: 'weird' });
  });
});

describe('CompletionGateway', () => {
  it('returns the completion text', async () => {
    const complete = vi.fn(async () => 'hello');
    const gateway = new CompletionGateway(complete);

    expect(await gateway.send('prompt', OPTIONS)).toEqual({ ok: true, text: 'hello' });
    expect(complete).toHaveBeenCalledWith('prompt', OPTIONS);
  });

  it.each([null, undefined, '', '   \n'])('reports %j as an empty response', async (reply) => {
    const gateway = new CompletionGateway(async () => reply);
    expect(await gateway.send('prompt', OPTIONS)).toEqual({
      ok: false,
      error: { kind: 'empty', message: 'service returned no content' },
    });
  });

  it('returns classified transport failures', async () => {
    const gateway = new CompletionGateway(async () => {
      throw new APIError(429, undefined, 'Too Many Requests', undefined);
    });
    expect(await gateway.send('prompt', OPTIONS)).toEqual({
      ok: false,
      error: { kind: 'service', message: '429 Too Many Requests', status: 429 },
    });
  });

  it('throws on a user abort', async () => {
    const gateway = new CompletionGateway(async () => {
      throw new APIUserAbortError();
    });
    await expect(gateway.send('prompt', OPTIONS)).rejects.toBeInstanceOf(PipelineAbortedError);
  });
});
