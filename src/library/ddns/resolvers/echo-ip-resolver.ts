import * as x from 'x-value';

import {getErrorMessage, isIPAddress} from '../../@utils/index.js';
import type {Context} from '../../common.js';
import {USER_AGENT_DEFAULT} from '../../common.js';
import {IPResolutionError} from '../../errors.js';
import type {IIPResolver} from '../ip-resolver.js';

export const ECHO_URL_DEFAULT = 'https://ifconfig.me/ip';

export const EchoIPResolverOptions = x.object({
  provider: x.literal('echo'),
  /**
   * Service answering with the caller's ip, as plain text or as a JSON object
   * with an "ip" field.
   */
  url: x.string.optional(),
});

export type EchoIPResolverOptions = x.TypeOf<typeof EchoIPResolverOptions>;

const EchoJSONResponse = x.object({
  ip: x.string,
});

export type EchoIPResolverInit = {
  url?: string;
  userAgent?: string;
  fetch?: typeof fetch;
};

export class EchoIPResolver implements IIPResolver {
  readonly name = 'echo';

  readonly url: string;

  private userAgent: string;
  private fetch: typeof fetch;

  constructor({
    url = ECHO_URL_DEFAULT,
    userAgent = USER_AGENT_DEFAULT,
    fetch = globalThis.fetch,
  }: EchoIPResolverInit = {}) {
    this.url = url;
    this.userAgent = userAgent;
    this.fetch = fetch;
  }

  async resolve({signal}: Context): Promise<string> {
    let status: number;
    let text: string;

    try {
      const response = await this.fetch(this.url, {
        headers: {'User-Agent': this.userAgent},
        signal,
      });

      status = response.status;
      text = await response.text();
    } catch (error) {
      throw new IPResolutionError(
        `Failed to query ${this.url}: ${getErrorMessage(error)}`,
        {cause: error},
      );
    }

    if (status < 200 || status >= 300) {
      throw new IPResolutionError(
        `Failed to query ${this.url}, received status ${status}.`,
      );
    }

    const ip = parseEchoResponse(text);

    if (!isIPAddress(ip)) {
      throw new IPResolutionError(
        `Unexpected response from ${this.url}: ${JSON.stringify(text)}.`,
      );
    }

    return ip;
  }
}

export function parseEchoResponse(text: string): string {
  text = text.trim();

  if (text.startsWith('{')) {
    let data: unknown;

    try {
      data = JSON.parse(text);
    } catch {
      return text;
    }

    if (EchoJSONResponse.is(data)) {
      return data.ip.trim();
    }
  }

  return text;
}
