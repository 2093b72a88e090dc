import type {Host} from './config.js';
import type {TickResult} from './reconciler.js';

export class ConfigError extends Error {
  override readonly name = 'ConfigError';
}

export class IPResolutionError extends Error {
  override readonly name: string = 'IPResolutionError';
}

export class RequestTimeoutError extends Error {
  override readonly name = 'RequestTimeoutError';

  constructor(readonly timeout: number) {
    super(`Request timed out after ${timeout}ms.`);
  }
}

export class HostUpdateError extends Error {
  override readonly name: string = 'HostUpdateError';

  constructor(
    readonly host: Host,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`${host.hostname}: ${message}`, options);
  }
}

/**
 * The provider answered with a 2xx status but the body is outside of the
 * success vocabulary (`good`, `nochg`).
 */
export class ProtocolResponseError extends HostUpdateError {
  override readonly name: string = 'ProtocolResponseError';

  constructor(
    host: Host,
    readonly body: string,
    explanation: string | undefined,
  ) {
    super(
      host,
      explanation === undefined
        ? `unexpected response "${body}"`
        : `unexpected response "${body}" (${explanation})`,
    );
  }
}

export class ReconcileError extends Error {
  override readonly name = 'ReconcileError';

  constructor(
    readonly result: TickResult,
    readonly failures: HostUpdateError[],
  ) {
    super(
      `${failures.length} of ${result.outcomes.length} host update(s) failed.`,
    );
  }
}
