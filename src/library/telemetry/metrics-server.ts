import type * as HTTP from 'http';

import Express from 'express';
import type {Registry} from 'prom-client';
import * as x from 'x-value';

import {
  METRICS_LISTENING_ON,
  METRICS_SERVER_ERROR,
  Logs,
} from '../@log/index.js';
import {Port} from '../x.js';

const METRICS_HOST_DEFAULT = '0.0.0.0';
const METRICS_PORT_DEFAULT = Port.nominalize(9090);

export const MetricsServerOptions = x.object({
  host: x.string.optional(),
  port: Port.optional(),
});

export type MetricsServerOptions = x.TypeOf<typeof MetricsServerOptions>;

export class MetricsServer {
  readonly app: Express.Express;

  readonly host: string;
  readonly port: number;

  private server: HTTP.Server | undefined;

  constructor(
    registry: Registry,
    {
      host = METRICS_HOST_DEFAULT,
      port = METRICS_PORT_DEFAULT,
    }: MetricsServerOptions,
  ) {
    const app = Express();

    app.get('/metrics', (_request, response, next) => {
      registry.metrics().then(text => {
        response.set('Content-Type', registry.contentType).send(text);
      }, next);
    });

    this.app = app;

    this.host = host;
    this.port = port;
  }

  listen(): Promise<void> {
    return new Promise((resolve, reject) => {
      const onStartupError = (error: Error): void => {
        this.server = undefined;
        reject(error);
      };

      const server = this.app.listen(this.port, this.host, () => {
        server.off('error', onStartupError);
        server.on('error', error =>
          Logs.error('metrics', METRICS_SERVER_ERROR(error)),
        );

        Logs.info('metrics', METRICS_LISTENING_ON(this.host, this.port));

        resolve();
      });

      server.once('error', onStartupError);

      this.server = server;
    });
  }

  close(): Promise<void> {
    const server = this.server;

    if (!server) {
      return Promise.resolve();
    }

    this.server = undefined;

    return new Promise((resolve, reject) =>
      server.close(error => (error ? reject(error) : resolve())),
    );
  }
}
