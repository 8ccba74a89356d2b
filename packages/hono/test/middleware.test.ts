import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { describe, expect, it } from 'vitest';
import { Config, MASK_TOKEN, type SendRequest, type Transport, type TrebllePayload } from '@treblle-node/core';
import { treblle } from '../src/index.js';

class RecordingTransport implements Transport {
  readonly regime = 'native' as const;
  readonly sent: SendRequest[] = [];
  closed = false;

  async send(request: SendRequest): Promise<number> {
    this.sent.push(request);
    return 202;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

class BrokenTransport implements Transport {
  readonly regime = 'native' as const;

  async send(): Promise<number> {
    throw new Error('network unreachable');
  }

  async close(): Promise<void> {}
}

function payloads(transport: RecordingTransport): TrebllePayload[] {
  return transport.sent.map(request => {
    const payload: TrebllePayload = JSON.parse(request.body);
    return payload;
  });
}

function setup(configure: (builder: ReturnType<typeof Config.builder>) => void = () => undefined) {
  const builder = Config.builder('test-key', 'test-project');
  configure(builder);
  const transport = new RecordingTransport();
  const middleware = treblle({ config: builder.build(), transport });
  const stream = { finish: (): void => undefined };
  const app = new Hono();
  app.use('*', middleware);
  app.get('/stream', () => {
    const encoder = new TextEncoder();
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode('{"items":'));
        stream.finish = () => {
          controller.enqueue(encoder.encode('[1,2]}'));
          controller.close();
        };
      },
    });
    return new Response(body, { headers: { 'content-type': 'application/json' } });
  });
  app.get('/health', c => c.json({ status: 'ok' }));
  app.post('/login', async c => {
    const body: { username?: string } = await c.req.json();
    return c.json({ user: body.username, token: 'abc123' }, 201);
  });
  app.get('/missing', c => c.json({ message: 'User not found' }, 404));
  app.get('/text', c => c.text('plain words'));
  app.get('/boom', () => {
    throw new TypeError('handler exploded');
  });
  app.get('/forbidden', () => {
    throw new HTTPException(403, { message: 'nope' });
  });
  return { app, transport, middleware, stream };
}

describe('treblle middleware', () => {
  it('should skip blacklisted routes entirely', async () => {
    const { app, transport, middleware } = setup();

    const res = await app.request('/health');
    await middleware.flush();

    expect(res.status).toBe(200);
    expect(transport.sent).toHaveLength(0);
    expect(middleware.observer.stats()).toMatchObject({ ignored: 1, sent: 0 });
  });

  it('should report a masked request and response', async () => {
    const { app, transport, middleware } = setup();

    const res = await app.request('/login?next=/home', {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        authorization: 'Bearer test-secret',
        'user-agent': 'vitest-agent',
        'x-forwarded-for': '203.0.113.5, 10.0.0.1',
      },
      body: JSON.stringify({ username: 'ada', password: 'super_secret' }),
    });
    await middleware.flush();

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({ user: 'ada', token: 'abc123' });

    const [payload] = payloads(transport);
    expect(transport.sent[0].apiKey).toBe('test-key');
    expect(payload.api_key).toBe('test-key');
    expect(payload.project_id).toBe('test-project');
    expect(payload.data.server.software).toBe('hono');
    expect(payload.data.request).toMatchObject({
      ip: '203.0.113.5',
      url: 'http://localhost/login?next=/home',
      user_agent: 'vitest-agent',
      method: 'POST',
      body: { username: 'ada', password: MASK_TOKEN },
    });
    expect(payload.data.request.headers.authorization).toBe(MASK_TOKEN);
    expect(payload.data.response).toMatchObject({ code: 201, body: { user: 'ada', token: MASK_TOKEN } });
    expect(payload.data.response.load_time).toBeGreaterThanOrEqual(0);
    expect(payload.data.errors).toEqual([]);
  });

  it('should derive an error entry from a 4xx JSON body', async () => {
    const { app, transport, middleware } = setup();

    await app.request('/missing');
    await middleware.flush();

    expect(payloads(transport)[0].data.errors).toEqual([
      { source: 'hono', type: 'HTTP_404', message: 'User not found', file: '', line: 0 },
    ]);
  });

  it('should record handler exceptions', async () => {
    const { app, transport, middleware } = setup();

    const res = await app.request('/boom');
    await middleware.flush();

    expect(res.status).toBe(500);
    const [error] = payloads(transport)[0].data.errors;
    expect(error).toMatchObject({ source: 'hono', type: 'TypeError', message: 'handler exploded' });
    expect(error.file).toContain('middleware.test.ts');
  });

  it('should record HTTP exceptions with their status', async () => {
    const { app, transport, middleware } = setup();

    const res = await app.request('/forbidden');
    await middleware.flush();

    expect(res.status).toBe(403);
    expect(payloads(transport)[0].data.response.code).toBe(403);
    expect(payloads(transport)[0].data.errors[0]).toMatchObject({ message: 'nope' });
  });

  it('should hand a streamed response to the client before it is complete', async () => {
    const { app, transport, middleware, stream } = setup();

    const res = await app.request('/stream');

    expect(res.status).toBe(200);
    expect(transport.sent).toHaveLength(0);

    stream.finish();
    expect(await res.json()).toEqual({ items: [1, 2] });
    await middleware.flush();

    expect(payloads(transport)[0].data.response).toMatchObject({ code: 200, size: 15, body: { items: [1, 2] } });
  });

  it('should wait for pending captures when closing', async () => {
    const { app, transport, middleware, stream } = setup();

    const res = await app.request('/stream');
    const closing = middleware.close();
    stream.finish();
    await res.text();
    await closing;

    expect(transport.sent).toHaveLength(1);
    expect(transport.closed).toBe(true);
  });

  it('should omit non-JSON bodies by default', async () => {
    const { app, transport, middleware } = setup();

    const res = await app.request('/text');
    await middleware.flush();

    expect(await res.text()).toBe('plain words');
    expect(payloads(transport)[0].data.response).not.toHaveProperty('body');
  });

  it('should forward non-JSON bodies as text under the raw policy', async () => {
    const { app, transport, middleware } = setup(builder => builder.setNonJsonBodyPolicy('raw'));

    await app.request('/text');
    await middleware.flush();

    expect(payloads(transport)[0].data.response).toMatchObject({ body: 'plain words', size: 11 });
  });

  it('should not let telemetry failures reach the client', async () => {
    const middleware = treblle({ config: Config.builder('test-key', 'test-project').build(), transport: new BrokenTransport() });
    const app = new Hono();
    app.use('*', middleware);
    app.get('/ok', c => c.json({ ok: true }));

    const res = await app.request('/ok');
    await middleware.flush();

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true });
    expect(middleware.observer.stats()).toMatchObject({ failed: 1, sent: 0 });
  });
});
