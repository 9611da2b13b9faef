import { CounterUpdateError, InvalidConfigError } from "./errors.js";
import { getLogger, type Logger } from "./logger.js";
import { addCounter, setGauge, type CounterSink, type GaugeSink } from "./metrics.js";

export type MetricUpdateFn = (value: number) => number;

/** `undefined` means identity. */
export type MaybeUpdateFn = MetricUpdateFn | undefined;

export interface MetricDetails {
  readonly counters: ReadonlyArray<readonly [CounterSink, MaybeUpdateFn]>;
  readonly gauges: ReadonlyArray<readonly [GaugeSink, MaybeUpdateFn]>;
}

/**
 * What happens when a counter rejects the delta it was given:
 * - `log`: warn under the logger's label and carry on
 * - `ignore`: carry on
 * - `throw`: fail the tick once every other entry has been applied
 */
export type CounterFailurePolicy = "log" | "ignore" | "throw";

export interface LoggerDetails {
  readonly label: string;
  readonly tag: string;
  readonly unit: string;
  readonly action: string;
  /** Sampling interval, the denominator of every rate. */
  readonly intervalSecs: number;
  readonly log: readonly [shouldLog: boolean, updateFn: MaybeUpdateFn];
  readonly metrics: MetricDetails;
  readonly onCounterFailure: CounterFailurePolicy;
}

/** Called once per sampling tick with the number of events seen since the previous tick. */
export type RateLogger<D> = (details: D, tag: string, count: number) => void;

export type TaggedMetric =
  | { readonly kind: "counter"; readonly handle: CounterSink }
  | { readonly kind: "gauge"; readonly handle: GaugeSink };

export const defaultLoggerDetails: LoggerDetails = {
  label: "defaultLabel",
  tag: "defaultTag",
  unit: "defaultUnit",
  action: "defaultAction",
  intervalSecs: 1.0,
  log: [true, undefined],
  metrics: { counters: [], gauges: [] },
  onCounterFailure: "log"
};

// Timers clamp longer delays to 1ms.
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/** Throws unless `intervalSecs` is positive and fits a timer delay. */
export function validateLoggerDetails(details: LoggerDetails): LoggerDetails {
  const { intervalSecs, label } = details;
  if (!Number.isFinite(intervalSecs) || intervalSecs <= 0) {
    throw new InvalidConfigError(`${label}: intervalSecs must be a positive number, got ${intervalSecs}`);
  }
  if (intervalSecs * 1000 > MAX_TIMER_DELAY_MS) {
    throw new InvalidConfigError(
      `${label}: intervalSecs must be at most ${MAX_TIMER_DELAY_MS / 1000}, got ${intervalSecs}`
    );
  }
  return details;
}

export function mkLoggerDetails(overrides: Partial<LoggerDetails> = {}): LoggerDetails {
  return validateLoggerDetails({ ...defaultLoggerDetails, ...overrides });
}

function apply(fn: MaybeUpdateFn, value: number): number {
  return fn ? fn(value) : value;
}

export function rateMessage(details: LoggerDetails, rate: number): string {
  return `${details.tag} ${details.action} at the rate of ${rate} ${details.unit}/sec`;
}

/**
 * Turns one sample into metric updates and an optional info line.
 * Counters receive the (transformed) sample; gauges and the log line receive it
 * divided by `intervalSecs`. Every entry is attempted; failures are thrown
 * together afterwards.
 */
export const infoRateLogger: RateLogger<LoggerDetails> = (details, _tag, count) => {
  const { metrics, intervalSecs, label } = validateLoggerDetails(details);
  const log = getLogger().child({ tag: label });
  const entries: Array<readonly [TaggedMetric, MaybeUpdateFn]> = [
    ...metrics.counters.map(([handle, fn]) => [{ kind: "counter", handle }, fn] as const),
    ...metrics.gauges.map(([handle, fn]) => [{ kind: "gauge", handle }, fn] as const)
  ];

  const failures: unknown[] = [];

  entries.forEach(([metric, fn], i) => {
    try {
      const value = apply(fn, count);
      switch (metric.kind) {
        case "counter":
          if (!addCounter(metric.handle, value)) {
            onCounterRejected(details, log, i, value, failures);
          }
          break;
        case "gauge":
          setGauge(metric.handle, value / intervalSecs);
          break;
      }
    } catch (err) {
      failures.push(err);
    }
  });

  const [shouldLog, logFn] = details.log;
  if (shouldLog) {
    const rate = apply(logFn, count) / intervalSecs;
    log.info(rateMessage(details, rate), { rate });
  }

  if (failures.length > 0) {
    throw new AggregateError(failures, `${label}: ${failures.length} metric update(s) failed`);
  }
};

function onCounterRejected(
  details: LoggerDetails,
  log: Logger,
  index: number,
  value: number,
  failures: unknown[]
): void {
  switch (details.onCounterFailure) {
    case "log":
      log.warn("counter rejected delta", { index, value });
      break;
    case "ignore":
      break;
    case "throw":
      failures.push(new CounterUpdateError(details.label, index, value));
      break;
  }
}
