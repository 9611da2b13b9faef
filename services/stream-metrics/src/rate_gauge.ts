import { InvalidConfigError } from "./errors.js";
import { validateLoggerDetails, type LoggerDetails, type RateLogger } from "./rate_logger.js";
import { append, map, takeWhile, unwrap, type Item, type Stream } from "./stream.js";

export interface LoggerConfig<Tag extends string> {
  readonly logger: RateLogger<LoggerDetails>;
  readonly details: ReadonlyMap<Tag, LoggerDetails>;
}

interface TickState {
  count: number;
  failure?: { error: unknown };
  abortIdle?: (error: unknown) => void;
}

/**
 * Counts the elements of `source` and hands the count since the previous tick
 * to `config.logger` every `intervalSecs` seconds.
 *
 * The result never completes: once `source` is exhausted it keeps waiting
 * while the ticks go on (reporting zero). Stop consuming it, or use
 * {@link finiteWithRateGauge}, to end it. A tick that throws fails the stream
 * on the next pull. Unknown tags and invalid intervals throw here, not on the
 * first pull.
 */
export function withRateGauge<Tag extends string, T>(
  config: LoggerConfig<Tag>,
  tag: Tag,
  source: Stream<T>
): Stream<T> {
  const details = config.details.get(tag);
  if (!details) {
    throw new InvalidConfigError(`No rate logger configured for tag "${tag}"`);
  }
  return gauge(config.logger, validateLoggerDetails(details), tag, source);
}

async function* gauge<T>(
  logger: RateLogger<LoggerDetails>,
  details: LoggerDetails,
  tag: string,
  source: Stream<T>
): AsyncGenerator<T> {
  const state: TickState = { count: 0 };

  const timer = setInterval(() => {
    const n = state.count;
    state.count = 0;
    try {
      logger(details, tag, n);
    } catch (error) {
      state.failure = { error };
      clearInterval(timer);
      state.abortIdle?.(error);
    }
  }, details.intervalSecs * 1000);

  try {
    for await (const t of source) {
      if (state.failure) throw state.failure.error;
      state.count += 1;
      yield t;
    }
    if (state.failure) throw state.failure.error;

    await new Promise<never>((_, reject) => {
      state.abortIdle = reject;
    });
  } finally {
    clearInterval(timer);
  }
}

/**
 * {@link withRateGauge} that ends when `source` ends: elements are wrapped, a
 * single end marker is appended, and the output is cut at that marker.
 */
export function finiteWithRateGauge<Tag extends string, T>(
  config: LoggerConfig<Tag>,
  tag: Tag,
  source: Stream<T>
): Stream<T> {
  const marked = append<Item<T>>(
    map(source, (value): Item<T> => ({ present: true, value })),
    { present: false }
  );
  return unwrap(takeWhile(withRateGauge(config, tag, marked), (item) => item.present));
}
