import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export type MonitorMetrics = {
  registry: Registry;
  cycles: Counter<'phase'>;
  observations: Counter<string>;
  providerFailures: Counter<'reason'>;
  providerLatency: Histogram<'outcome'>;
  spikes: Counter<string>;
  suppressed: Counter<string>;
  sinkResults: Counter<'sink' | 'outcome'>;
};

export function createMetrics(opts: { defaults?: boolean } = {}): MonitorMetrics {
  const registry = new Registry();
  if (opts.defaults) collectDefaultMetrics({ register: registry });
  return {
    registry,
    cycles: new Counter({ name: 'volspike_cycles_total', help: 'Completed polling passes', labelNames: ['phase'], registers: [registry] }),
    observations: new Counter({ name: 'volspike_observations_total', help: 'Pair snapshots fed to the detector', registers: [registry] }),
    providerFailures: new Counter({ name: 'volspike_provider_failures_total', help: 'Missed provider fetches by reason', labelNames: ['reason'], registers: [registry] }),
    providerLatency: new Histogram({
      name: 'volspike_provider_latency_seconds',
      help: 'DexScreener request latency',
      labelNames: ['outcome'],
      buckets: [0.1, 0.25, 0.5, 1, 2.5, 5, 10, 15],
      registers: [registry],
    }),
    spikes: new Counter({ name: 'volspike_spikes_total', help: 'Dispatched volume spikes', registers: [registry] }),
    suppressed: new Counter({ name: 'volspike_spikes_suppressed_total', help: 'Qualifying spikes held back by cooldown', registers: [registry] }),
    sinkResults: new Counter({ name: 'volspike_sink_results_total', help: 'Sink deliveries by outcome', labelNames: ['sink', 'outcome'], registers: [registry] }),
  };
}
