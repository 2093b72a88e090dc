import Chalk from 'chalk';

import {
  METRICS_SERVER_ERROR,
  SPAN_ERROR,
  formatLogPrefix,
} from '../library/@log/index.js';
import {
  HostUpdateError,
  LogSpan,
  LogTelemetry,
  SpanId,
} from '../library/index.js';

import {createHost} from './@fakes.js';

function createContext(): {signal: AbortSignal} {
  return {signal: new AbortController().signal};
}

beforeAll(() => {
  Chalk.level = 0;
});

afterEach(() => {
  vi.restoreAllMocks();
});

test('format log prefix', () => {
  expect(formatLogPrefix('scheduler')).toBe('[scheduler]');
  expect(
    formatLogPrefix({
      type: 'span',
      name: 'update',
      id: SpanId.nominalize('0000abcd'),
    }),
  ).toBe('[update#0000abcd]');
  expect(
    formatLogPrefix({
      type: 'span',
      name: 'update',
      id: SpanId.nominalize('0000abcd'),
      hostname: 'home.example.com',
    }),
  ).toBe('[update#0000abcd home.example.com]');
});

test('write events with fields', () => {
  const info = vi.spyOn(console, 'info').mockImplementation(() => {});
  const error = vi.spyOn(console, 'error').mockImplementation(() => {});

  const telemetry = new LogTelemetry();

  telemetry.info(createContext(), 'public ip 203.0.113.7.', {
    resolver: 'echo',
    attempt: 1,
    skipped: undefined,
  });
  telemetry.error(createContext(), 'failed to resolve public ip.');

  expect(info).toHaveBeenCalledWith(
    '[service]',
    'public ip 203.0.113.7.',
    'resolver=echo attempt=1',
  );
  expect(error).toHaveBeenCalledWith('[service]', 'failed to resolve public ip.');
});

test('write events within a span', () => {
  const info = vi.spyOn(console, 'info').mockImplementation(() => {});

  const telemetry = new LogTelemetry();

  const [reconcileContext, reconcileSpan] = telemetry.startSpan(
    createContext(),
    'reconcile',
  );
  const [context, span] = telemetry.startSpan(reconcileContext, 'update');

  span.setAttributes({hostname: 'home.example.com', statusCode: undefined});

  telemetry.info(context, 'host updated.');

  expect(span).toBeInstanceOf(LogSpan);

  if (!(span instanceof LogSpan)) {
    return;
  }

  expect(span.parent).toBe(reconcileSpan);
  expect(span.attributes).toEqual({hostname: 'home.example.com'});
  expect(span.events).toEqual(['host updated.']);

  expect(info).toHaveBeenCalledWith(
    `[update#${span.id} home.example.com]`,
    'host updated.',
  );
});

test('record metrics into the registry', async () => {
  const telemetry = new LogTelemetry({prefix: 'dynsync_'});

  const context = createContext();

  const counter = telemetry.counter('ticks_total', 'Reconcile passes.');

  counter.add(context, 1);
  telemetry.counter('ticks_total', 'Reconcile passes.').add(context, 1);

  expect(telemetry.counter('ticks_total', 'Reconcile passes.')).toBe(counter);

  const outcomes = telemetry.counter('outcomes', 'Host outcomes.', ['outcome']);

  outcomes.add(context, 1, {outcome: 'updated'});
  outcomes.add(context, 2, {outcome: 'failed'});

  telemetry
    .histogram('latency', 'Pass latency.', {buckets: [100, 1000]})
    .record(context, 120);

  const text = await telemetry.registry.metrics();

  expect(text).toContain('dynsync_ticks_total 2\n');
  expect(text).toContain('dynsync_outcomes{outcome="updated"} 1\n');
  expect(text).toContain('dynsync_outcomes{outcome="failed"} 2\n');
  expect(text).toContain('dynsync_latency_bucket{le="100"} 0\n');
  expect(text).toContain('dynsync_latency_bucket{le="1000"} 1\n');
  expect(text).toContain('dynsync_latency_sum 120\n');
  expect(text).toContain('dynsync_latency_count 1\n');
});

test('metrics are noted on the current span', () => {
  const telemetry = new LogTelemetry();

  const [context, span] = telemetry.startSpan(createContext(), 'reconcile');

  telemetry.counter('count', 'Count.').add(context, 1);

  if (!(span instanceof LogSpan)) {
    throw new Error('Expected a LogSpan.');
  }

  expect(span.events).toEqual(['count +1']);
});

test('span ids are 8 hexadecimal digits', () => {
  const telemetry = new LogTelemetry();

  const [context, parent] = telemetry.startSpan(createContext(), 'reconcile');
  const [, child] = telemetry.startSpan(context, 'update');

  for (const {id} of [parent, child]) {
    expect(id).toMatch(/^[0-9a-f]{8}$/);
    expect(SpanId.is(id)).toBe(true);
  }
});

test('describe errors in log lines', () => {
  expect(
    METRICS_SERVER_ERROR(
      Object.assign(new Error('listen failed'), {code: 'EADDRINUSE'}),
    ),
  ).toBe('metrics server error: EADDRINUSE (listen failed)');
  expect(
    SPAN_ERROR(new HostUpdateError(createHost('a.example.com'), 'nohost')),
  ).toBe('error: HostUpdateError (a.example.com: nohost)');
  expect(SPAN_ERROR(new TypeError(''))).toBe('error: TypeError');
  expect(SPAN_ERROR('aborted')).toBe('error: aborted');
});
