import {
  RECONCILE_ERROR_RESOLVING_IP,
  RECONCILE_HOSTS_FAILED,
  RECONCILE_HOST_FAILED,
  RECONCILE_HOST_UNCHANGED,
  RECONCILE_HOST_UPDATED,
  RECONCILE_PUBLIC_IP,
} from './@log/index.js';
import {getErrorMessage} from './@utils/index.js';
import type {Context} from './common.js';
import type {Host} from './config.js';
import type {IIPResolver, IUpdateClient, Outcome} from './ddns/index.js';
import {classify, describeResponseCode} from './ddns/index.js';
import {
  HostUpdateError,
  IPResolutionError,
  ProtocolResponseError,
  ReconcileError,
} from './errors.js';
import type {ICounter, IHistogram, ITelemetry} from './telemetry/index.js';

export type HostOutcome = {
  host: Host;
  outcome: Outcome;
  error?: HostUpdateError;
};

export type TickResult = {
  ip: string;
  /**
   * One entry per configured host, in configuration order.
   */
  outcomes: HostOutcome[];
};

export type ReconcileEngineOptions = {
  hosts: readonly Host[];
  resolver: IIPResolver;
  client: IUpdateClient;
  telemetry: ITelemetry;
};

/**
 * One reconcile pass: resolve the public ip once, then update every host
 * concurrently with it.
 */
export class ReconcileEngine {
  readonly hosts: readonly Host[];

  private resolver: IIPResolver;
  private client: IUpdateClient;
  private telemetry: ITelemetry;

  private count: ICounter;
  private errors: ICounter;
  private latency: IHistogram;
  private hostUpdates: ICounter;

  constructor({hosts, resolver, client, telemetry}: ReconcileEngineOptions) {
    this.hosts = hosts;
    this.resolver = resolver;
    this.client = client;
    this.telemetry = telemetry;

    this.count = telemetry.counter(
      'operation_count',
      'Number of times the service is ran',
    );
    this.errors = telemetry.counter(
      'operation_errors',
      'Number of times the service encounters an error',
    );
    this.latency = telemetry.histogram(
      'operation_latency',
      'Latency when the service is ran (ms)',
      {buckets: [10, 50, 100, 250, 500, 1000, 2500, 5000, 10000]},
    );
    this.hostUpdates = telemetry.counter(
      'host_updates',
      'Number of host updates by outcome',
      ['outcome'],
    );
  }

  /**
   * Resolves with the tick result if every host succeeded. Rejects with
   * `IPResolutionError` if the ip could not be resolved (no host is touched
   * then), or with `ReconcileError` if at least one host failed.
   */
  async execute(context: Context): Promise<TickResult> {
    const telemetry = this.telemetry;

    const [reconcileContext, span] = telemetry.startSpan(context, 'reconcile');

    this.count.add(reconcileContext, 1);

    const startedAt = Date.now();

    try {
      return await this._execute(reconcileContext);
    } catch (error) {
      this.errors.add(reconcileContext, 1);
      span.recordError(error);
      throw error;
    } finally {
      this.latency.record(reconcileContext, Date.now() - startedAt);
      span.end();
    }
  }

  private async _execute(context: Context): Promise<TickResult> {
    const telemetry = this.telemetry;

    let ip: string;

    try {
      ip = await this.resolver.resolve(context);
    } catch (error) {
      telemetry.error(context, RECONCILE_ERROR_RESOLVING_IP, {
        resolver: this.resolver.name,
        error: getErrorMessage(error),
      });

      throw error instanceof IPResolutionError
        ? error
        : new IPResolutionError(getErrorMessage(error), {cause: error});
    }

    context.span?.setAttributes({ip});

    telemetry.info(context, RECONCILE_PUBLIC_IP(ip));

    const outcomes = await Promise.all(
      this.hosts.map(host => this.updateHost(context, host, ip)),
    );

    const result: TickResult = {ip, outcomes};

    const failures = outcomes.flatMap(({error}) => (error ? [error] : []));

    if (failures.length > 0) {
      telemetry.error(
        context,
        RECONCILE_HOSTS_FAILED(failures.length, outcomes.length),
      );

      throw new ReconcileError(result, failures);
    }

    return result;
  }

  private async updateHost(
    context: Context,
    host: Host,
    ip: string,
  ): Promise<HostOutcome> {
    const telemetry = this.telemetry;

    const [hostContext, span] = telemetry.startSpan(context, 'update');

    span.setAttributes({hostname: host.hostname});

    let outcome: Outcome;
    let error: HostUpdateError | undefined;

    try {
      const {status, body} = await this.client.update(hostContext, host, ip);

      span.setAttributes({statusCode: status});

      outcome = classify(status, body);

      if (outcome.type === 'failed') {
        error =
          status >= 300
            ? new HostUpdateError(host, outcome.detail)
            : new ProtocolResponseError(host, body, describeResponseCode(body));
      }
    } catch (caught) {
      const detail = getErrorMessage(caught);

      outcome = {type: 'failed', detail};
      error = new HostUpdateError(host, detail, {cause: caught});
    }

    span.setAttributes({change: outcome.type});

    this.hostUpdates.add(hostContext, 1, {outcome: outcome.type});

    switch (outcome.type) {
      case 'updated':
        telemetry.info(hostContext, RECONCILE_HOST_UPDATED, {
          hostname: host.hostname,
          ip,
        });
        break;
      case 'unchanged':
        telemetry.info(hostContext, RECONCILE_HOST_UNCHANGED, {
          hostname: host.hostname,
          ip,
        });
        break;
      case 'failed':
        span.recordError(error);
        telemetry.error(hostContext, RECONCILE_HOST_FAILED, {
          hostname: host.hostname,
          error: error?.message,
        });
        break;
    }

    span.end();

    return error ? {host, outcome, error} : {host, outcome};
  }
}
