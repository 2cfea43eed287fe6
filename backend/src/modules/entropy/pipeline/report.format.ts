/**
 * Plain-text rendering of a cross-market report for the CLI.
 */

import type { CrossMarketReport, MarketReport } from '../entropy.types.js';

function pct(x: number | null): string {
  return x === null ? '-' : `${(x * 100).toFixed(1)}%`;
}

function num(x: number | null, digits = 4): string {
  return x === null ? '-' : x.toFixed(digits);
}

function pad(s: string, width: number): string {
  return s.length >= width ? s : s + ' '.repeat(width - s.length);
}

export function formatComparisonTable(report: CrossMarketReport): string {
  const header = ['market', 'strategy', 'mode', 'win_rate', 'sample_size', 'p_value'];
  const widths = [8, 12, 17, 10, 13, 10];
  const line = (cells: string[]) => cells.map((c, i) => pad(c, widths[i])).join('').trimEnd();

  const lines = [line(header), '-'.repeat(widths.reduce((s, w) => s + w, 0))];
  for (const row of report.comparison) {
    lines.push(
      line([
        row.market,
        row.strategy,
        row.mode,
        pct(row.win_rate),
        String(row.sample_size),
        num(row.p_value),
      ])
    );
  }
  return lines.join('\n');
}

export function formatMarketSummary(m: MarketReport): string {
  const out = [
    `${m.market} — ${m.name} (benchmark ${m.benchmark})`,
    `  instruments: ${m.tickers.length} used, ${m.excluded.length} excluded`,
    `  entropy: ${m.entropy.validPoints}/${m.entropy.points} valid, ` +
      `range ${num(m.entropy.min)}..${num(m.entropy.max)}${m.entropy.fromCache ? ' (cached)' : ''}`,
    `  threshold: ${num(m.thresholds.entropy.value)} (p${m.thresholds.entropy.percentile})` +
      (m.thresholds.volatility ? `, volatility ${num(m.thresholds.volatility.value, 2)}` : ''),
    `  signals: ${m.signals.entropyEntries} entries in ${m.signals.evaluationDays} evaluation days`,
  ];
  for (const r of m.results) {
    out.push(
      `  ${pad(r.strategy, 11)} ${pad(r.mode, 16)} win ${pct(r.winRate)} ` +
        `n=${r.sampleSize} p=${num(r.pValue)} ${r.significance}`.trimEnd()
    );
  }
  const change = m.entropyChange;
  for (const r of change.results) {
    out.push(
      `  ${pad(r.strategy, 11)} ${pad(r.mode, 16)} win ${pct(r.winRate)} ` +
        `n=${r.sampleSize} p=${num(r.pValue)} crash ${pct(r.crashRate)} (lag ${change.lag})`
    );
  }
  const corr = m.forwardCorrelations
    .filter(c => c.indicator === 'entropy')
    .map(c => `${c.horizon}d ${num(c.correlation, 3)}`);
  if (corr.length > 0) out.push(`  corr(entropy, forward return): ${corr.join(', ')}`);
  if (m.entropyVolatilityCorrelation !== null) {
    out.push(`  corr(entropy, volatility): ${num(m.entropyVolatilityCorrelation, 3)}`);
  }
  return out.join('\n');
}

export function formatReport(report: CrossMarketReport): string {
  const sections = report.markets.map(formatMarketSummary);
  for (const f of report.failures) {
    sections.push(`${f.market} — FAILED ${f.error}: ${f.message}`);
  }
  sections.push(formatComparisonTable(report));
  return sections.join('\n\n');
}
