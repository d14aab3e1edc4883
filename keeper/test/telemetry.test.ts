import { afterEach, describe, expect, it } from 'vitest';

import { Metrics } from '../src/telemetry/metrics.js';
import { HealthServer } from '../src/telemetry/health.js';

describe('Metrics', () => {
  it('accumulates counters and converts bigint gauges', () => {
    const m = new Metrics();
    m.inc('ticks');
    m.inc('ticks', 2);
    m.setGauge('mining_price', 1_500n);

    expect(m.counter('ticks')).toBe(3);
    expect(m.counter('tick_errors')).toBe(0);
    expect(m.snapshot()).toEqual({ counters: { ticks: 3 }, gauges: { mining_price: 1500 } });
  });

  it('rejects non-finite values', () => {
    const m = new Metrics();
    expect(() => m.inc('ticks', Number.NaN)).toThrow('Metrics: increment must be finite');
    expect(() => m.setGauge('treasury_value', Number.POSITIVE_INFINITY)).toThrow('Metrics: gauge value must be finite');
  });

  it('renders the Prometheus text format in name order', () => {
    const m = new Metrics();
    m.inc('ticks');
    m.inc('epoch_races_lost');
    m.setGauge('mining_epoch_id', 4);

    expect(m.render('k')).toBe(
      [
        '# TYPE k_epoch_races_lost_total counter',
        'k_epoch_races_lost_total 1',
        '# TYPE k_ticks_total counter',
        'k_ticks_total 1',
        '# TYPE k_mining_epoch_id gauge',
        'k_mining_epoch_id 4',
        '',
      ].join('\n'),
    );
    expect(new Metrics().render()).toBe('');
  });
});

describe('HealthServer', () => {
  let server: HealthServer | undefined;

  afterEach(async () => {
    await server?.stop();
    server = undefined;
  });

  it('serves status on /health and metrics on /metrics', async () => {
    let ok = true;
    server = new HealthServer({
      port: 0,
      getStatus: () => ({ ok, ready: true, keeper: '0xkeeper' }),
      getMetrics: () => 'k_ticks_total 1\n',
    });
    await server.start();
    const base = `http://127.0.0.1:${server.boundPort}`;

    const health = await fetch(`${base}/health`);
    expect(health.status).toBe(200);
    expect(await health.json()).toEqual({ ok: true, ready: true, keeper: '0xkeeper' });

    ok = false;
    expect((await fetch(`${base}/health`)).status).toBe(503);

    const metrics = await fetch(`${base}/metrics`);
    expect(metrics.status).toBe(200);
    expect(await metrics.text()).toBe('k_ticks_total 1\n');

    expect((await fetch(`${base}/nope`)).status).toBe(404);
  });
});
