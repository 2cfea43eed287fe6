/**
 * ENTROPY MODULE — Types
 *
 * Price series, return matrix, entropy series, signals, trades and
 * backtest results. Dates are trading days as YYYY-MM-DD strings.
 */

// ═══════════════════════════════════════════════════════════════
// DATES
// ═══════════════════════════════════════════════════════════════

export interface DateRange {
  from: string; // YYYY-MM-DD, inclusive
  to: string;   // YYYY-MM-DD, inclusive
}

// ═══════════════════════════════════════════════════════════════
// PRICES
// ═══════════════════════════════════════════════════════════════

export interface PricePoint {
  readonly date: string;
  readonly ticker: string;
  readonly adjustedClose: number;
}

export interface PriceSeries {
  readonly market: string;
  readonly ticker: string;
  readonly points: readonly PricePoint[];
}

export type ExclusionReason = 'DATA_UNAVAILABLE' | 'INCOMPLETE_HISTORY';

export interface ExcludedInstrument {
  ticker: string;
  reason: ExclusionReason;
  detail?: string;
}

// ═══════════════════════════════════════════════════════════════
// RETURNS
// ═══════════════════════════════════════════════════════════════

export interface ReturnMatrix {
  readonly dates: readonly string[];
  readonly tickers: readonly string[];
  /** rows[i][j] = log return of tickers[j] on dates[i] */
  readonly rows: readonly (readonly number[])[];
  readonly excluded: readonly ExcludedInstrument[];
}

// ═══════════════════════════════════════════════════════════════
// ENTROPY
// ═══════════════════════════════════════════════════════════════

export type InvalidEntropyReason = 'DEGENERATE_CORRELATION' | 'ZERO_VARIANCE';

export type EntropyPoint =
  | { readonly date: string; readonly valid: true; readonly value: number }
  | {
      readonly date: string;
      readonly valid: false;
      readonly value: null;
      readonly reason: InvalidEntropyReason;
    };

export interface EntropySeries {
  readonly market: string;
  readonly window: number;
  readonly tickers: readonly string[];
  readonly points: readonly EntropyPoint[];
}

/** Generic signal input. null marks a gap. */
export interface IndicatorPoint {
  readonly date: string;
  readonly value: number | null;
}

// ═══════════════════════════════════════════════════════════════
// SIGNALS
// ═══════════════════════════════════════════════════════════════

export interface TrainingSlice {
  readonly kind: 'training';
  readonly range: DateRange;
  readonly points: readonly IndicatorPoint[];
}

export interface EvaluationSlice {
  readonly kind: 'evaluation';
  readonly range: DateRange;
  readonly points: readonly IndicatorPoint[];
}

export interface TrainedThreshold {
  readonly value: number;
  readonly percentile: number;
  readonly trainedOn: DateRange;
  readonly sampleSize: number;
}

export type SignalDirection = 'enter' | 'neutral';

export interface Signal {
  readonly date: string;
  readonly direction: SignalDirection;
  readonly value: number | null;
}

// ═══════════════════════════════════════════════════════════════
// BACKTEST
// ═══════════════════════════════════════════════════════════════

export type TradeMode = 'overlapping' | 'non_overlapping' | 'weekly';

export type StrategyName = 'entropy' | 'volatility' | 'combined' | 'entropy_change';

export interface Trade {
  entryDate: string;
  exitDate: string;
  entryPrice: number;
  exitPrice: number;
  realizedReturn: number; // exit / entry - 1
  logReturn: number;
  signalValue: number | null;
}

export interface TradeSkipCounts {
  unmatched: number;   // signal date not in benchmark calendar
  beyondData: number;  // exit past the end of the backtest window
  overlapping: number; // inside a previous trade (non_overlapping / weekly)
  offWeekday: number;  // weekly mode only
}

export interface TradeLedger {
  mode: TradeMode;
  holdingPeriod: number;
  trades: Trade[];
  skipped: TradeSkipCounts;
}

export type Significance = '***' | '**' | '*' | '';

export interface BacktestResult {
  market: string;
  strategy: StrategyName;
  mode: TradeMode;
  holdingPeriod: number;
  sampleSize: number;
  wins: number;
  /** null exactly when sampleSize is 0 */
  winRate: number | null;
  /** one-sided binomial P(X >= wins | n, 0.5); null exactly when sampleSize is 0 */
  pValue: number | null;
  significance: Significance;
  meanReturn: number | null;
  medianReturn: number | null;
  stdReturn: number | null;
  minReturn: number | null;
  maxReturn: number | null;
  distribution: { p10: number; p50: number; p90: number } | null;
  tStat: number | null;
  pValueReturn: number | null;
  ciLow: number | null;
  ciHigh: number | null;
  /** share of trades whose log return fell below the crash threshold */
  crashRate: number | null;
  skipped: TradeSkipCounts;
}

export interface EntropyBucket {
  label: string;
  lowerQuantile: number;
  upperQuantile: number;
  lowerValue: number;
  upperValue: number;
  sampleSize: number;
  meanReturn: number | null;
  winRate: number | null;
}

// ═══════════════════════════════════════════════════════════════
// REPORTS
// ═══════════════════════════════════════════════════════════════

export interface SensitivityCell {
  sampleSize: number;
  winRate: number | null;
  pValue: number | null;
  meanReturn: number | null;
}

export interface SensitivityRow {
  percentile: number;
  entropyThreshold: number;
  volatilityThreshold: number | null;
  entropy: SensitivityCell;
  volatility: SensitivityCell | null;
}

/** Pearson correlation of an indicator with the benchmark's forward returns. */
export interface ForwardCorrelation {
  indicator: 'entropy' | 'entropy_change';
  horizon: number;
  correlation: number | null;
  sampleSize: number;
}

export interface EntropyChangeReport {
  lag: number;
  threshold: TrainedThreshold;
  entries: number;
  results: BacktestResult[];
}

export interface MarketReport {
  market: string;
  name: string;
  benchmark: string;
  tickers: string[];
  excluded: ExcludedInstrument[];
  window: number;
  entropy: {
    points: number;
    validPoints: number;
    invalidPoints: number;
    min: number | null;
    max: number | null;
    mean: number | null;
    fromCache: boolean;
  };
  thresholds: {
    entropy: TrainedThreshold;
    volatility: TrainedThreshold | null;
  };
  signals: { evaluationDays: number; entropyEntries: number };
  results: BacktestResult[];
  buckets: EntropyBucket[];
  sensitivity: SensitivityRow[];
  entropyVolatilityCorrelation: number | null;
  /** evaluation period only */
  forwardCorrelations: ForwardCorrelation[];
  entropyChange: EntropyChangeReport;
}

export interface MarketFailure {
  market: string;
  error: string;
  message: string;
}

export interface ComparisonRow {
  market: string;
  strategy: StrategyName;
  mode: TradeMode;
  win_rate: number | null;
  sample_size: number;
  p_value: number | null;
}

export interface CrossMarketReport {
  runId: string;
  generatedAt: string;
  source: string;
  markets: MarketReport[];
  comparison: ComparisonRow[];
  failures: MarketFailure[];
  durationMs: number;
}
