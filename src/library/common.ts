import * as x from 'x-value';

import type {ISpan} from './telemetry/index.js';

export const USER_AGENT_DEFAULT = 'dynsync/0.1 (+https://www.npmjs.com/package/dynsync)';

export const SpanId = x.string.refined<'span id'>(value => {
  if (!/^[0-9a-f]{8}$/.test(value)) {
    throw new TypeError('Invalid span id, expecting 8 hexadecimal digits');
  }

  return value;
});

export type SpanId = x.TypeOf<typeof SpanId>;

export function generateSpanId(): SpanId {
  return SpanId.nominalize(
    Math.floor(Math.random() * 0x100000000)
      .toString(16)
      .padStart(8, '0'),
  );
}

/**
 * Execution context threaded explicitly through every reconcile call: the
 * cancellation signal the call observes and the span it belongs to.
 */
export type Context = {
  signal: AbortSignal;
  span?: ISpan;
};

export function createContext(signal: AbortSignal): Context {
  return {signal};
}
