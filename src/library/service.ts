import {SERVICE_STARTED} from './@log/index.js';
import type {Context} from './common.js';
import {createContext} from './common.js';
import type {Config, Host} from './config.js';
import type {IIPResolver, IUpdateClient} from './ddns/index.js';
import {NicUpdateClient, createIPResolver} from './ddns/index.js';
import type {TickResult} from './reconciler.js';
import {ReconcileEngine} from './reconciler.js';
import {Scheduler} from './scheduler.js';
import type {ITelemetry} from './telemetry/index.js';
import {LogTelemetry} from './telemetry/index.js';

export const METRIC_PREFIX = 'dynsync_';

export type ServiceCollaborators = {
  telemetry: ITelemetry;
  resolver: IIPResolver;
  client: IUpdateClient;
};

export class Service {
  readonly telemetry: ITelemetry;

  private engine: ReconcileEngine;
  private scheduler: Scheduler;

  constructor(
    readonly config: Config,
    {telemetry, resolver, client}: ServiceCollaborators,
  ) {
    this.telemetry = telemetry;

    this.engine = new ReconcileEngine({
      hosts: config.hosts,
      resolver,
      client,
      telemetry,
    });

    this.scheduler = new Scheduler(context => this.engine.execute(context), {
      interval: config.interval,
      telemetry,
    });
  }

  get hosts(): readonly Host[] {
    return this.config.hosts;
  }

  /**
   * Runs a single reconcile pass.
   */
  tick(context: Context): Promise<TickResult> {
    return this.engine.execute(context);
  }

  run(signal: AbortSignal): Promise<never> {
    this.telemetry.info(
      createContext(signal),
      SERVICE_STARTED(this.hosts.length, this.config.interval),
    );

    return this.scheduler.run(signal);
  }
}

export class ServiceBuilder {
  private _telemetry: ITelemetry | undefined;
  private _resolver: IIPResolver | undefined;
  private _client: IUpdateClient | undefined;

  constructor(readonly config: Config) {}

  telemetry(telemetry: ITelemetry): this {
    this._telemetry = telemetry;
    return this;
  }

  resolver(resolver: IIPResolver): this {
    this._resolver = resolver;
    return this;
  }

  updateClient(client: IUpdateClient): this {
    this._client = client;
    return this;
  }

  build(): Service {
    const config = this.config;

    return new Service(config, {
      telemetry: this._telemetry ?? new LogTelemetry({prefix: METRIC_PREFIX}),
      resolver:
        this._resolver ?? createIPResolver(config.resolver, config.userAgent),
      client:
        this._client ?? new NicUpdateClient({userAgent: config.userAgent}),
    });
  }
}
