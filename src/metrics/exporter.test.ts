import { describe, it, expect, vi } from "vitest";
import { createMetricsExporter } from "./exporter.js";
import type { Collector, GaugeSample } from "./collector.js";

function makeCollector(...rounds: GaugeSample[][]): Collector {
  const collect = vi.fn<() => Promise<GaugeSample[]>>(async () => []);
  for (const samples of rounds) collect.mockResolvedValueOnce(samples);
  return {
    describe: () => [
      { name: "test_total_bytes", help: "Total bytes" },
      { name: "test_used_bytes", help: "Used bytes" },
    ],
    collect,
  };
}

describe("createMetricsExporter", () => {
  it("renders collected samples in the text exposition format", async () => {
    const exporter = createMetricsExporter(
      makeCollector([
        { name: "test_total_bytes", value: 1099511627776 },
        { name: "test_used_bytes", value: 549755813888 },
      ]),
    );

    const body = await exporter.scrape();

    expect(body).toContain("# HELP test_total_bytes Total bytes");
    expect(body).toContain("# TYPE test_total_bytes gauge");
    expect(body).toMatch(/^test_total_bytes 1099511627776$/m);
    expect(body).toMatch(/^test_used_bytes 549755813888$/m);
  });

  it("keeps the descriptors but drops stale values after a failed collect", async () => {
    const exporter = createMetricsExporter(
      makeCollector([{ name: "test_total_bytes", value: 10 }], []),
    );

    await exporter.scrape();
    const body = await exporter.scrape();

    expect(body).toContain("# HELP test_total_bytes Total bytes");
    expect(body).toContain("# HELP test_used_bytes Used bytes");
    expect(body).not.toMatch(/^test_total_bytes /m);
    expect(body).not.toMatch(/^test_used_bytes /m);
  });

  it("ignores samples for undeclared metrics", async () => {
    const exporter = createMetricsExporter(makeCollector([{ name: "unknown_metric", value: 1 }]));

    expect(await exporter.scrape()).not.toContain("unknown_metric");
  });

  it("exposes the Prometheus text content type", () => {
    const exporter = createMetricsExporter(makeCollector());
    expect(exporter.contentType).toContain("text/plain");
  });
});
