import axios, { AxiosError, AxiosHeaders, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { ModelBackendError } from '../../../execution/errors';
import { OpenAICompatibleModelBackend, parseCompletion, toModelBackendError, toWireMessages } from '../client';

type Responder = (config: InternalAxiosRequestConfig) => Promise<AxiosResponse>;

function respond(config: InternalAxiosRequestConfig, data: unknown, status = 200): AxiosResponse {
  return { data, status, statusText: String(status), headers: {}, config };
}

function backend(responder: Responder): OpenAICompatibleModelBackend {
  return new OpenAICompatibleModelBackend({
    baseUrl: 'http://model.test',
    timeoutMs: 1000,
    model: 'general-model',
    roleModels: { coding: 'code-model' },
    http: axios.create({ baseURL: 'http://model.test', adapter: responder }),
  });
}

function requestBody(config: InternalAxiosRequestConfig): unknown {
  return typeof config.data === 'string' ? JSON.parse(config.data) : config.data;
}

const reply = { choices: [{ message: { content: 'Hello' } }], usage: { prompt_tokens: 12, completion_tokens: 3 } };

describe('OpenAICompatibleModelBackend', () => {
  it('should post the conversation with the role model and limits', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const client = backend(async (config) => {
      seen.push(config);
      return respond(config, reply);
    });

    const completion = await client.complete({
      role: 'coding',
      messages: [{ role: 'user', content: 'Fix it' }],
      tools: [{ name: 'read_file', description: 'Read a file' }],
      max_tokens: 256,
      temperature: 0.2,
      trace_id: 'trace-7',
    });

    expect(completion).toEqual({ content: 'Hello', tool_calls: [], usage: { prompt_tokens: 12, completion_tokens: 3 } });
    expect(seen[0].url).toBe('/v1/chat/completions');
    expect(seen[0].headers.get('x-trace-id')).toBe('trace-7');
    expect(requestBody(seen[0])).toEqual({
      model: 'code-model',
      messages: [{ role: 'user', content: 'Fix it' }],
      tools: [
        {
          type: 'function',
          function: {
            name: 'read_file',
            description: 'Read a file',
            parameters: { type: 'object', additionalProperties: true },
          },
        },
      ],
      max_tokens: 256,
      temperature: 0.2,
    });
  });

  it('should fall back to the default model and omit empty tools', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const client = backend(async (config) => {
      seen.push(config);
      return respond(config, reply);
    });

    await client.complete({ role: 'router', messages: [{ role: 'user', content: 'Hi' }], tools: [] });

    expect(requestBody(seen[0])).toEqual({ model: 'general-model', messages: [{ role: 'user', content: 'Hi' }] });
  });

  it('should mark server errors as retryable', async () => {
    const client = backend(async (config) => {
      throw new AxiosError('Service unavailable', 'ERR_BAD_RESPONSE', config, undefined, respond(config, {}, 503));
    });

    const failure = client.complete({ role: 'router', messages: [] });

    await expect(failure).rejects.toBeInstanceOf(ModelBackendError);
    await expect(failure).rejects.toMatchObject({
      message: 'Model backend responded with status 503',
      retryable: true,
    });
  });

  it('should not retry a rejected request', async () => {
    const client = backend(async (config) => {
      throw new AxiosError('Bad request', 'ERR_BAD_REQUEST', config, undefined, respond(config, {}, 400));
    });

    await expect(client.complete({ role: 'router', messages: [] })).rejects.toMatchObject({
      message: 'Model backend responded with status 400',
      retryable: false,
    });
  });

  it('should report health from the models endpoint', async () => {
    const healthy = backend(async (config) => respond(config, { data: [] }));
    const broken = backend(async (config) => {
      throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
    });

    await expect(healthy.healthCheck()).resolves.toBe(true);
    await expect(broken.healthCheck()).resolves.toBe(false);
  });

  it('should pick the model per role', () => {
    const client = backend(async (config) => respond(config, reply));

    expect(client.modelFor('coding')).toBe('code-model');
    expect(client.modelFor('toString')).toBe('general-model');
  });
});

describe('parseCompletion', () => {
  it('should decode tool calls', () => {
    const completion = parseCompletion({
      choices: [
        {
          message: {
            content: null,
            tool_calls: [{ id: 'call-1', function: { name: 'read_file', arguments: '{"path":"/tmp/a.txt"}' } }],
          },
        },
      ],
    });

    expect(completion).toEqual({
      content: '',
      tool_calls: [{ id: 'call-1', name: 'read_file', arguments: { path: '/tmp/a.txt' } }],
    });
  });

  it('should reject malformed tool arguments', () => {
    const parse = () =>
      parseCompletion({
        choices: [{ message: { tool_calls: [{ id: 'c', function: { name: 'read_file', arguments: '{path' } }] } }],
      });

    expect(parse).toThrow("Model returned malformed arguments for tool 'read_file'");
  });

  it('should reject a response without choices', () => {
    expect(() => parseCompletion({ choices: [] })).toThrow('Model backend returned an unexpected response');
  });
});

describe('toModelBackendError', () => {
  it('should treat timeouts and unreachable backends as retryable', () => {
    const config = { headers: new AxiosHeaders() };

    expect(toModelBackendError(new AxiosError('timeout', 'ECONNABORTED', config))).toMatchObject({
      message: 'Model request timed out',
      retryable: true,
    });
    expect(toModelBackendError(new AxiosError('socket hang up', 'ECONNRESET', config))).toMatchObject({
      message: 'Model backend unreachable: socket hang up',
      retryable: true,
    });
    expect(toModelBackendError(new Error('odd'))).toMatchObject({
      message: 'Model request failed: odd',
      retryable: false,
    });
  });
});

describe('toWireMessages', () => {
  it('should encode tool calls and tool replies', () => {
    expect(
      toWireMessages([
        { role: 'assistant', content: '', tool_calls: [{ id: 'c1', name: 'list_directory', arguments: { path: '/tmp' } }] },
        { role: 'tool', content: '[]', tool_call_id: 'c1', name: 'list_directory' },
      ]),
    ).toEqual([
      {
        role: 'assistant',
        content: '',
        tool_calls: [{ id: 'c1', type: 'function', function: { name: 'list_directory', arguments: '{"path":"/tmp"}' } }],
      },
      { role: 'tool', content: '[]', tool_call_id: 'c1', name: 'list_directory' },
    ]);
  });
});
