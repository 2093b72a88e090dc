import type {Context, SpanId} from '../common.js';

export type TelemetryValue = string | number | boolean;

export type TelemetryFields = Record<string, TelemetryValue | undefined>;

export type ISpan = {
  readonly id: SpanId;
  readonly name: string;

  setAttributes(attributes: TelemetryFields): void;

  addEvent(name: string): void;

  recordError(error: unknown): void;

  end(): void;
};

export type ICounter = {
  add(context: Context, value: number, labels?: Record<string, string>): void;
};

export type IHistogram = {
  record(context: Context, value: number, labels?: Record<string, string>): void;
};

export type HistogramOptions = {
  labelNames?: string[];
  buckets?: number[];
};

/**
 * Sink for structured logs, spans and metrics. Injected into every component
 * that reports anything, never looked up globally.
 */
export type ITelemetry = {
  info(context: Context, message: string, fields?: TelemetryFields): void;

  error(context: Context, message: string, fields?: TelemetryFields): void;

  /**
   * Starts a child span of `context.span` and returns the context carrying
   * it along with the span handle.
   */
  startSpan(context: Context, name: string): [context: Context, span: ISpan];

  counter(name: string, help: string, labelNames?: string[]): ICounter;

  histogram(name: string, help: string, options?: HistogramOptions): IHistogram;
};
