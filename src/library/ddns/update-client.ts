import {timeoutSignal} from '../@utils/index.js';
import type {Context} from '../common.js';
import {USER_AGENT_DEFAULT} from '../common.js';
import type {Host} from '../config.js';
import {ConfigError, RequestTimeoutError} from '../errors.js';

export const UPDATE_ENDPOINT_DEFAULT = 'https://domains.google.com/nic/update';

export const UPDATE_TIMEOUT_DEFAULT = 5000;

export type UpdateResponse = {
  status: number;
  body: string;
};

export type IUpdateClient = {
  update(context: Context, host: Host, ip: string): Promise<UpdateResponse>;
};

export type NicUpdateClientOptions = {
  endpoint?: string;
  userAgent?: string;
  /**
   * Per request timeout in milliseconds.
   */
  timeout?: number;
  fetch?: typeof fetch;
};

/**
 * Client of the `nic/update` protocol. All requests go through the same
 * `fetch` dispatcher, so connections are pooled across hosts and ticks.
 */
export class NicUpdateClient implements IUpdateClient {
  readonly endpoint: string;
  readonly userAgent: string;
  readonly timeout: number;

  private fetch: typeof fetch;

  constructor({
    endpoint = UPDATE_ENDPOINT_DEFAULT,
    userAgent = USER_AGENT_DEFAULT,
    timeout = UPDATE_TIMEOUT_DEFAULT,
    fetch = globalThis.fetch,
  }: NicUpdateClientOptions = {}) {
    if (userAgent.trim() === '') {
      // The provider rejects requests without one ("badagent").
      throw new ConfigError('User agent must not be empty.');
    }

    if (!(timeout > 0)) {
      throw new ConfigError(`Invalid update timeout ${timeout}.`);
    }

    this.endpoint = endpoint;
    this.userAgent = userAgent;
    this.timeout = timeout;
    this.fetch = fetch;
  }

  async update(
    {signal}: Context,
    {hostname, user, password}: Host,
    ip: string,
  ): Promise<UpdateResponse> {
    const url = new URL(this.endpoint);

    url.searchParams.set('hostname', hostname);
    url.searchParams.set('myip', ip);

    const [requestSignal, dispose] = timeoutSignal(
      signal,
      this.timeout,
      () => new RequestTimeoutError(this.timeout),
    );

    try {
      const response = await this.fetch(url, {
        method: 'GET',
        headers: {
          Authorization: `Basic ${Buffer.from(`${user}:${password}`).toString('base64')}`,
          'User-Agent': this.userAgent,
        },
        signal: requestSignal,
      });

      return {
        status: response.status,
        body: await response.text(),
      };
    } finally {
      dispose();
    }
  }
}
