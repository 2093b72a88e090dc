import {Counter, Histogram, Registry} from 'prom-client';

import type {SpanLogContext, LogContext} from '../@log/index.js';
import {SPAN_ENDED, SPAN_ERROR, Logs} from '../@log/index.js';
import type {Context} from '../common.js';
import {generateSpanId} from '../common.js';

import type {
  HistogramOptions,
  ICounter,
  IHistogram,
  ISpan,
  ITelemetry,
  TelemetryFields,
  TelemetryValue,
} from './telemetry.js';

export type LogTelemetryOptions = {
  registry?: Registry;
  /**
   * Prefix prepended to every metric name.
   */
  prefix?: string;
};

export class LogSpan implements ISpan {
  readonly id = generateSpanId();

  readonly attributes: Record<string, TelemetryValue> = {};

  readonly events: string[] = [];

  readonly errors: unknown[] = [];

  private startedAt = Date.now();

  private ended = false;

  constructor(
    readonly name: string,
    readonly parent: ISpan | undefined,
  ) {}

  get logContext(): SpanLogContext {
    const hostname = this.attributes['hostname'];

    return {
      type: 'span',
      name: this.name,
      id: this.id,
      ...(typeof hostname === 'string' && {hostname}),
    };
  }

  setAttributes(attributes: TelemetryFields): void {
    for (const [key, value] of Object.entries(attributes)) {
      if (value !== undefined) {
        this.attributes[key] = value;
      }
    }
  }

  addEvent(name: string): void {
    this.events.push(name);
  }

  recordError(error: unknown): void {
    this.errors.push(error);

    Logs.debug(this.logContext, SPAN_ERROR(error));
  }

  end(): void {
    if (this.ended) {
      return;
    }

    this.ended = true;

    Logs.debug(this.logContext, SPAN_ENDED(Date.now() - this.startedAt));
  }
}

/**
 * Telemetry written to the console through `Logs`, with metrics kept in a
 * prom-client registry.
 */
export class LogTelemetry implements ITelemetry {
  readonly registry: Registry;

  private prefix: string;

  private counterMap = new Map<string, ICounter>();
  private histogramMap = new Map<string, IHistogram>();

  constructor({registry = new Registry(), prefix = ''}: LogTelemetryOptions = {}) {
    this.registry = registry;
    this.prefix = prefix;
  }

  info(context: Context, message: string, fields?: TelemetryFields): void {
    context.span?.addEvent(message);

    Logs.info(getLogContext(context), message, ...formatFields(fields));
  }

  error(context: Context, message: string, fields?: TelemetryFields): void {
    context.span?.addEvent(message);

    Logs.error(getLogContext(context), message, ...formatFields(fields));
  }

  startSpan(context: Context, name: string): [Context, ISpan] {
    const span = new LogSpan(name, context.span);

    return [{...context, span}, span];
  }

  counter(name: string, help: string, labelNames: string[] = []): ICounter {
    name = this.prefix + name;

    let counter = this.counterMap.get(name);

    if (!counter) {
      const metric = new Counter({
        name,
        help,
        labelNames,
        registers: [this.registry],
      });

      counter = {
        add(context, value, labels = {}) {
          metric.inc(labels, value);
          context.span?.addEvent(`${name} +${value}`);
        },
      };

      this.counterMap.set(name, counter);
    }

    return counter;
  }

  histogram(
    name: string,
    help: string,
    {labelNames = [], buckets}: HistogramOptions = {},
  ): IHistogram {
    name = this.prefix + name;

    let histogram = this.histogramMap.get(name);

    if (!histogram) {
      const metric = new Histogram({
        name,
        help,
        labelNames,
        ...(buckets && {buckets}),
        registers: [this.registry],
      });

      histogram = {
        record(context, value, labels = {}) {
          metric.observe(labels, value);
          context.span?.addEvent(`${name} ${value}`);
        },
      };

      this.histogramMap.set(name, histogram);
    }

    return histogram;
  }
}

function getLogContext({span}: Context): LogContext {
  if (span instanceof LogSpan) {
    return span.logContext;
  }

  return span ? {type: 'span', name: span.name, id: span.id} : 'service';
}

function formatFields(fields: TelemetryFields | undefined): string[] {
  if (!fields) {
    return [];
  }

  const pairs = Object.entries(fields)
    .filter((entry): entry is [string, TelemetryValue] => entry[1] !== undefined)
    .map(([key, value]) => `${key}=${value}`);

  return pairs.length > 0 ? [pairs.join(' ')] : [];
}
