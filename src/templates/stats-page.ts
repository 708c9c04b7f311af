import { html } from "hono/html";

export interface StatsView {
  /** YYYY-MM-DD */
  date: string;
  /** Terabytes, three decimals */
  totalQuota: string;
  usedQuota: string;
  percentageUsed: number;
}

export function formatPercentage(value: number): string {
  return Number.isFinite(value) ? `${value.toFixed(2)}%` : "n/a";
}

export function renderStatsPage(view: StatsView) {
  const width = Number.isFinite(view.percentageUsed)
    ? Math.min(Math.max(view.percentageUsed, 0), 100).toFixed(2)
    : "0";

  return html`<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>Storage quota</title>
    <style>
      body { font-family: system-ui, sans-serif; margin: 3rem auto; max-width: 36rem; color: #222; }
      dl { display: grid; grid-template-columns: max-content 1fr; gap: 0.5rem 1.5rem; }
      dt { font-weight: 600; }
      .bar { height: 1rem; background: #e5e7eb; border-radius: 0.5rem; overflow: hidden; }
      .bar > div { height: 100%; background: #2563eb; }
    </style>
  </head>
  <body>
    <h1>Storage quota</h1>
    <dl>
      <dt>Report date</dt><dd>${view.date}</dd>
      <dt>Total quota</dt><dd>${view.totalQuota} TB</dd>
      <dt>Used quota</dt><dd>${view.usedQuota} TB</dd>
      <dt>Used</dt><dd>${formatPercentage(view.percentageUsed)}</dd>
    </dl>
    <div class="bar"><div style="width: ${width}%"></div></div>
  </body>
</html>`;
}
