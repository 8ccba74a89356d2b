import { describe, expect, it } from 'vitest';
import { Config, MASK_TOKEN, TelemetryObserver, type TrebllePayload } from '../src/index.js';
import { FailingTransport, HangingTransport, RecordingTransport, sampleRequest } from './helpers/fakes.js';

function decode(body: string): TrebllePayload {
  const payload: TrebllePayload = JSON.parse(body);
  return payload;
}

describe('TelemetryObserver', () => {
  const config = Config.builder('test-key', 'test-project').setTimeout(100).build();

  it('should count blacklisted paths and send nothing for them', async () => {
    const transport = new RecordingTransport();
    const observer = new TelemetryObserver(config, { transport });

    expect(observer.isIgnored('/health')).toBe(true);
    expect(observer.isIgnored('/api/users')).toBe(false);
    await observer.flush();

    expect(transport.sent).toHaveLength(0);
    expect(observer.stats()).toEqual({ sent: 0, failed: 0, dropped: 0, ignored: 1, inFlight: 0 });
  });

  it('should mask, build and send an observation', async () => {
    const transport = new RecordingTransport();
    const observer = new TelemetryObserver(config, { transport, server: { software: 'test-host' } });

    const result = await observer.observe({
      request: sampleRequest({
        body: { password: 'super_secret', credit_card: '4111-1111-1111-1111', regular_field: 'visible_data' },
      }),
      response: { headers: {}, code: 200, size: 0, load_time: 0.01 },
    });
    await observer.flush();

    expect(result).toBeUndefined();
    expect(transport.sent).toHaveLength(1);
    const payload = decode(transport.sent[0].body);
    expect(payload.data.request.body).toEqual({
      password: MASK_TOKEN,
      credit_card: MASK_TOKEN,
      regular_field: 'visible_data',
    });
    expect(payload.data.server.software).toBe('test-host');
    expect(transport.sent[0].body).not.toContain('super_secret');
    expect(transport.sent[0].body).not.toContain('4111-1111-1111-1111');
  });

  it('should await the send inline for constrained transports', async () => {
    const transport = new RecordingTransport('constrained');
    const observer = new TelemetryObserver(config, { transport });

    const outcome = await observer.observe({ request: sampleRequest() });

    expect(outcome).toMatchObject({ state: 'Sent', statusCode: 202 });
    expect(observer.stats().sent).toBe(1);
  });

  it('should drop incomplete observations without sending', async () => {
    const transport = new RecordingTransport();
    const observer = new TelemetryObserver(config, { transport });

    await expect(observer.observe({ request: sampleRequest({ method: '' }) })).resolves.toBeUndefined();

    expect(transport.sent).toHaveLength(0);
    expect(observer.stats()).toMatchObject({ dropped: 1, sent: 0 });
  });

  it('should never surface transport failures to the caller', async () => {
    const observer = new TelemetryObserver(config, { transport: new FailingTransport('constrained') });

    const outcome = await observer.observe({ request: sampleRequest() });

    expect(outcome).toMatchObject({ state: 'Failed', error: { kind: 'ConnectFailed' } });
    expect(observer.stats().failed).toBe(1);
  });

  it('should return before a hanging native send completes', async () => {
    const transport = new HangingTransport('native');
    const observer = new TelemetryObserver(config, { transport });

    await expect(observer.observe({ request: sampleRequest() })).resolves.toBeUndefined();

    expect(observer.stats().inFlight).toBe(1);
    await observer.close();
    expect(observer.stats()).toMatchObject({ inFlight: 0, failed: 1 });
  });

  it('should bound a hanging inline send by the timeout', async () => {
    const observer = new TelemetryObserver(config, { transport: new HangingTransport('constrained') });

    const started = Date.now();
    const outcome = await observer.observe({ request: sampleRequest() });

    expect(outcome).toMatchObject({ state: 'Failed', error: { kind: 'Timeout' } });
    expect(Date.now() - started).toBeLessThan(1_000);
  });
});
