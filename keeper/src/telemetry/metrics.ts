export type CounterName =
  | 'ticks'
  | 'tick_errors'
  | 'epochs_observed'
  | 'settlements_submitted'
  | 'settlements_confirmed'
  | 'settlements_failed'
  | 'epoch_races_lost'
  | 'approvals_submitted';

export type GaugeName =
  | 'mining_price'
  | 'mining_rate'
  | 'mining_epoch_id'
  | 'treasury_price'
  | 'treasury_epoch_id'
  | 'treasury_value'
  | 'last_tick_unix';

export type MetricsSnapshot = {
  counters: Partial<Record<CounterName, number>>;
  gauges: Partial<Record<GaugeName, number>>;
};

export class Metrics {
  private readonly counters = new Map<CounterName, number>();
  private readonly gauges = new Map<GaugeName, number>();

  inc(name: CounterName, by: number = 1): void {
    if (!Number.isFinite(by)) throw new Error('Metrics: increment must be finite');
    this.counters.set(name, (this.counters.get(name) ?? 0) + by);
  }

  // Token amounts are bigint; gauges are approximate by nature.
  setGauge(name: GaugeName, value: number | bigint): void {
    const n = typeof value === 'bigint' ? Number(value) : value;
    if (!Number.isFinite(n)) throw new Error('Metrics: gauge value must be finite');
    this.gauges.set(name, n);
  }

  counter(name: CounterName): number {
    return this.counters.get(name) ?? 0;
  }

  snapshot(): MetricsSnapshot {
    const snap: MetricsSnapshot = { counters: {}, gauges: {} };
    for (const [name, value] of this.counters) snap.counters[name] = value;
    for (const [name, value] of this.gauges) snap.gauges[name] = value;
    return snap;
  }

  /** Prometheus text exposition, names prefixed with `prefix_`. */
  render(prefix: string = 'dutchmine_keeper'): string {
    const lines: string[] = [];
    for (const [name, value] of [...this.counters].sort(([a], [b]) => a.localeCompare(b))) {
      lines.push(`# TYPE ${prefix}_${name}_total counter`, `${prefix}_${name}_total ${value}`);
    }
    for (const [name, value] of [...this.gauges].sort(([a], [b]) => a.localeCompare(b))) {
      lines.push(`# TYPE ${prefix}_${name} gauge`, `${prefix}_${name} ${value}`);
    }
    return lines.length ? lines.join('\n') + '\n' : '';
  }
}
