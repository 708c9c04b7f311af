import { Gauge, Registry } from "prom-client";
import type { Collector } from "./collector.js";

export interface MetricsExporter {
  readonly contentType: string;
  scrape(signal?: AbortSignal): Promise<string>;
}

export function createMetricsExporter(collector: Collector): MetricsExporter {
  const registry = new Registry();
  const gauges = new Map<string, Gauge>();

  for (const descriptor of collector.describe()) {
    gauges.set(
      descriptor.name,
      new Gauge({ name: descriptor.name, help: descriptor.help, registers: [registry] }),
    );
  }

  return {
    contentType: registry.contentType,

    async scrape(signal) {
      const samples = await collector.collect(signal);

      // Clear and set without yielding so concurrent scrapes cannot interleave.
      for (const gauge of gauges.values()) gauge.remove();
      for (const sample of samples) gauges.get(sample.name)?.set(sample.value);
      return registry.metrics();
    },
  };
}
