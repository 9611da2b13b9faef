import client from "prom-client";
import type {
  Counter as PromCounter,
  Gauge as PromGauge,
  LabelValues,
  MetricObjectWithValues,
  MetricValue,
  Registry
} from "prom-client";

export type MetricName = string;
export type MetricHelp = string;

export const registry: Registry = new client.Registry();

// Add default Node.js / process metrics (CPU, memory, GC, event loop, etc.)
export function collectDefaultMetrics(into: Registry = registry): void {
  client.collectDefaultMetrics({ register: into });
}

export type Counter = PromCounter<string>;
export type Gauge = PromGauge<string>;

// What the rate logger and vector children need; plain handles and labelled
// children both satisfy these.
export interface CounterSink {
  inc(value?: number): void;
}

export interface GaugeSink {
  inc(value?: number): void;
  dec(value?: number): void;
  set(value: number): void;
}

/**
 * An unregistered metric. Nothing reaches a registry until {@link register}.
 */
export interface Metric<S> {
  readonly name: MetricName;
  readonly help: MetricHelp;
  instantiate(registers: Registry[]): S;
}

/** A metric that can also be turned into a labelled family of children of type `C`. */
export interface VectorMetric<S, C> extends Metric<S> {
  vectorize<L extends string>(labelNames: readonly L[]): Metric<Vector<L, C>>;
}

export function register<S>(metric: Metric<S>, into: Registry = registry): S {
  return metric.instantiate([into]);
}

export async function registerFrom<S>(
  make: () => Metric<S> | Promise<Metric<S>>,
  into: Registry = registry
): Promise<S> {
  return register(await make(), into);
}

//
// Counter
//

export function mkCounter(name: MetricName, help: MetricHelp): VectorMetric<Counter, CounterSink> {
  return {
    name,
    help,
    instantiate: (registers) => new client.Counter({ name, help, registers }),
    vectorize: <L extends string>(labelNames: readonly L[]) => ({
      name,
      help,
      instantiate: (registers: Registry[]) =>
        new Vector<L, CounterSink>(
          labelNames,
          new client.Counter<L>({ name, help, labelNames, registers })
        )
    })
  };
}

export function mkRegCounter(name: MetricName, help: MetricHelp, into: Registry = registry): Counter {
  return register(mkCounter(name, help), into);
}

export async function getCounter(c: Counter): Promise<number> {
  const { values } = await c.get();
  return values[0]?.value ?? 0;
}

export function incCounter(c: CounterSink): void {
  c.inc();
}

/**
 * Adds `value` to the counter. Returns false, leaving the counter untouched,
 * when `value` is negative or not finite.
 */
export function addCounter(c: CounterSink, value: number): boolean {
  if (!Number.isFinite(value) || value < 0) return false;
  c.inc(value);
  return true;
}

//
// Gauge
//

export function mkGauge(name: MetricName, help: MetricHelp): VectorMetric<Gauge, GaugeSink> {
  return {
    name,
    help,
    instantiate: (registers) => new client.Gauge({ name, help, registers }),
    vectorize: <L extends string>(labelNames: readonly L[]) => ({
      name,
      help,
      instantiate: (registers: Registry[]) =>
        new Vector<L, GaugeSink>(
          labelNames,
          new client.Gauge<L>({ name, help, labelNames, registers })
        )
    })
  };
}

export function mkRegGauge(name: MetricName, help: MetricHelp, into: Registry = registry): Gauge {
  return register(mkGauge(name, help), into);
}

export async function getGauge(g: Gauge): Promise<number> {
  const { values } = await g.get();
  return values[0]?.value ?? 0;
}

export function incGauge(g: GaugeSink): void {
  g.inc();
}

export function addGauge(g: GaugeSink, value: number): void {
  g.inc(value);
}

export function setGauge(g: GaugeSink, value: number): void {
  g.set(value);
}

export function subGauge(g: GaugeSink, value: number): void {
  g.dec(value);
}

export function decGauge(g: GaugeSink): void {
  g.dec();
}

//
// Vector
//

interface Labelled<L extends string, C> {
  labels(labels: LabelValues<L>): C;
  remove(labels: LabelValues<L>): void;
  reset(): void;
  get(): Promise<MetricObjectWithValues<MetricValue<L>>>;
}

export interface LabelledValue<L extends string> {
  labels: LabelValues<L>;
  value: number;
}

export class Vector<L extends string, C> {
  constructor(
    readonly labelNames: readonly L[],
    private readonly metric: Labelled<L, C>
  ) {}

  child(labels: LabelValues<L>): C {
    return this.metric.labels(labels);
  }

  remove(labels: LabelValues<L>): void {
    this.metric.remove(labels);
  }

  clear(): void {
    this.metric.reset();
  }

  async values(): Promise<LabelledValue<L>[]> {
    const { values } = await this.metric.get();
    return values.map((v) => ({ labels: v.labels, value: v.value }));
  }
}

export function mkVector<L extends string, C>(
  labelNames: readonly L[],
  metric: VectorMetric<unknown, C>
): Metric<Vector<L, C>> {
  return metric.vectorize(labelNames);
}

export function mkRegVector<L extends string, C>(
  labelNames: readonly L[],
  metric: VectorMetric<unknown, C>,
  into: Registry = registry
): Vector<L, C> {
  return register(mkVector(labelNames, metric), into);
}

export function withLabel<L extends string, C>(
  vector: Vector<L, C>,
  labels: LabelValues<L>,
  fn: (child: C) => void
): void {
  fn(vector.child(labels));
}

export function removeLabel<L extends string, C>(vector: Vector<L, C>, labels: LabelValues<L>): void {
  vector.remove(labels);
}

export function clearLabels<L extends string, C>(vector: Vector<L, C>): void {
  vector.clear();
}

export function getVectorWith<L extends string, C>(vector: Vector<L, C>): Promise<LabelledValue<L>[]> {
  return vector.values();
}
