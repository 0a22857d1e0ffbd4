import { afterAll, beforeAll, beforeEach, describe, it, expect } from 'vitest';
import { createTask, type TaskInput, type TaskOf } from '@cadence/scheduler';
import { ApiCallExecutor } from '../api-call.js';
import { startServer, type TestServer } from './http-fixture.js';

let server: TestServer;

beforeAll(async () => {
  server = await startServer((req) => {
    switch (req.url) {
      case '/ok':
        return { body: 'pong' };
      case '/echo':
        return { contentType: 'application/json', body: req.body };
      case '/down':
        return { status: 503, body: 'down for maintenance' };
      case '/big':
        return { body: 'x'.repeat(10_050) };
      default:
        return { status: 404, body: '' };
    }
  });
});

afterAll(async () => {
  await server.close();
});

beforeEach(() => {
  server.requests.length = 0;
});

function apiTask(path: string, extra: Partial<TaskInput> = {}): TaskOf<'api_call'> {
  const task = createTask({ name: 'Api', schedule: '@once', type: 'api_call', apiUrl: `${server.baseUrl}${path}`, ...extra });
  if (task.type !== 'api_call') throw new Error('expected an api_call task');
  return task;
}

describe('ApiCallExecutor', () => {
  it('returns the response body on success', async () => {
    const result = await new ApiCallExecutor().execute(apiTask('/ok'));
    expect(result).toEqual({ status: 'success', data: 'pong' });
  });

  it('sends the user agent and the task headers', async () => {
    await new ApiCallExecutor({ userAgent: 'cadence-test' }).execute(apiTask('/ok', {
      apiHeaders: { 'X-Token': 'test-secret' },
    }));

    const [request] = server.requests;
    expect(request?.method).toBe('GET');
    expect(request?.headers['user-agent']).toBe('cadence-test');
    expect(request?.headers['x-token']).toBe('test-secret');
  });

  it('sends a JSON body for methods that carry one', async () => {
    const result = await new ApiCallExecutor().execute(apiTask('/echo', {
      apiMethod: 'POST',
      apiBody: { hello: 'world' },
    }));

    const [request] = server.requests;
    expect(request?.method).toBe('POST');
    expect(request?.headers['content-type']).toBe('application/json');
    expect(request?.body).toBe('{"hello":"world"}');
    expect(result).toEqual({ status: 'success', data: '{"hello":"world"}' });
  });

  it('drops the body on GET', async () => {
    await new ApiCallExecutor().execute(apiTask('/ok', { apiBody: { ignored: true } }));
    expect(server.requests[0]?.body).toBe('');
  });

  it('reports a non-2xx status with the response body', async () => {
    const result = await new ApiCallExecutor().execute(apiTask('/down'));
    expect(result).toEqual({ status: 'error', error: 'HTTP 503: Service Unavailable - down for maintenance' });
  });

  it('truncates long bodies', async () => {
    const result = await new ApiCallExecutor().execute(apiTask('/big'));
    expect(result).toEqual({ status: 'success', data: `${'x'.repeat(10_000)}\n...(truncated)` });
  });

  it('reports a connection failure', async () => {
    const closed = await startServer(() => ({ body: '' }));
    await closed.close();
    const task = createTask({ name: 'Api', schedule: '@once', type: 'api_call', apiUrl: `${closed.baseUrl}/gone` });
    if (task.type !== 'api_call') throw new Error('expected an api_call task');

    const result = await new ApiCallExecutor().execute(task);
    expect(result).toEqual({ status: 'error', error: `Request to ${closed.baseUrl}/gone failed: fetch failed` });
  });
});
