import { describe, it, expect } from 'vitest';
import { RequestMetrics } from '../src/services/metricsService';
import { formatAddress } from '../src/services/patientService';
import { SmsProvider, SmsSendResult } from '../src/services/sms';
import { createTestServices, FakeMapsProvider, patientInput, RecordingSmsProvider } from './helpers';

describe('MessagingService', () => {
  it('logs sent messages with the provider id', async () => {
    const sms = new RecordingSmsProvider();
    const services = createTestServices({}, { sms });

    const outcome = await services.messaging.send('+14085550111', 'hello', { note: 'manual' });

    expect(outcome).toMatchObject({ status: 'sent', providerStatus: 'queued', providerMessageId: 'SM1' });
    expect(sms.sent).toEqual([{ to: '+14085550111', body: 'hello' }]);
    expect(services.messages.list(1)[0]).toMatchObject({
      direction: 'out',
      channel: 'live',
      to: '+14085550111',
      note: 'manual',
      provider_message_id: 'SM1',
    });
  });

  it('logs rejected sends with a failure note', async () => {
    const services = createTestServices({}, { sms: new RecordingSmsProvider('invalid number') });

    const outcome = await services.messaging.send('+10000000000', 'hello');

    expect(outcome).toMatchObject({ status: 'failed', error: 'invalid number' });
    expect(services.messages.list(1)[0]).toMatchObject({ note: 'send-failed', provider_message_id: null });
  });

  it('propagates errors that are not provider rejections', async () => {
    const broken: SmsProvider = {
      channel: 'live',
      send: async (): Promise<SmsSendResult> => {
        throw new TypeError('bug');
      },
    };
    const services = createTestServices({}, { sms: broken });

    await expect(services.messaging.send('+14085550111', 'hello')).rejects.toThrow('bug');
    expect(services.messages.list(10)).toEqual([]);
  });
});

describe('PatientService', () => {
  it('normalizes the phone on write and lookup', async () => {
    const services = createTestServices();
    const stored = await services.patients.upsert(patientInput({ phone: '408-555-0111' }));

    expect(stored.phone).toBe('+14085550111');
    expect(services.patients.findByPhone('(408) 555 0111')?.id).toBe(stored.id);
    expect(services.patients.findByPhone('not a phone')).toBeNull();
  });

  it('geocodes patients without coordinates when maps is live', async () => {
    const maps = new FakeMapsProvider({ location: { lat: 37.4, lon: -122.1 } });
    const services = createTestServices({}, { maps });

    const stored = await services.patients.upsert(patientInput({ latitude: null, longitude: null }));

    expect(stored).toMatchObject({ latitude: 37.4, longitude: -122.1 });
    expect(maps.geocodeCalls).toBe(1);
  });

  it('keeps given coordinates and tolerates geocoding misses', async () => {
    const maps = new FakeMapsProvider({ location: null });
    const services = createTestServices({}, { maps });

    const given = await services.patients.upsert(patientInput());
    const missed = await services.patients.upsert(
      patientInput({ phone: '+14085550222', latitude: null, longitude: null })
    );

    expect(given).toMatchObject({ latitude: 37.3, longitude: -121.9 });
    expect(missed).toMatchObject({ latitude: null, longitude: null });
    expect(maps.geocodeCalls).toBe(1);
  });

  it('formats addresses for geocoding', () => {
    expect(formatAddress({ address: '1 Main St', city: 'San Jose', state: 'CA', zip: '95113' })).toBe(
      '1 Main St, San Jose, CA 95113'
    );
    expect(formatAddress({ address: '', city: 'San Jose', state: '', zip: '' })).toBe('San Jose');
  });
});

describe('RequestMetrics', () => {
  it('tracks requests, errors and mean latency', () => {
    let clock = 1_000;
    const metrics = new RequestMetrics(() => clock);

    metrics.observe(0.1);
    metrics.observe(0.3);
    metrics.recordError();
    clock = 3_500;

    expect(metrics.snapshot()).toEqual({ requests: 2, errors: 1, avg_latency_seconds: 0.2 });
    expect(metrics.uptimeSeconds()).toBe(2.5);
  });

  it('renders Prometheus text', () => {
    const metrics = new RequestMetrics(() => 0);
    metrics.observe(0.5);

    const lines = metrics.toPrometheus().split('\n');
    expect(lines).toContain('hha_requests_total 1');
    expect(lines).toContain('hha_errors_total 0');
    expect(lines).toContain('hha_latency_seconds_avg 0.5');
    expect(lines).toContain('hha_uptime_seconds 0');
    expect(lines).toContain('# TYPE hha_requests_total counter');
    expect(lines[lines.length - 1]).toBe('');
  });
});
