import {publicIpv4, publicIpv6} from 'public-ip';
import * as x from 'x-value';

import {getErrorMessage} from '../../@utils/index.js';
import type {Context} from '../../common.js';
import {IPResolutionError} from '../../errors.js';
import type {IIPResolver} from '../ip-resolver.js';

const IP_TYPE_DEFAULT = 'ipv4';

export const IPType = x.union([x.literal('ipv4'), x.literal('ipv6')]);

export type IPType = x.TypeOf<typeof IPType>;

export const PublicIPResolverOptions = x.object({
  provider: x.literal('public-ip'),
  type: IPType.optional(),
});

export type PublicIPResolverOptions = x.TypeOf<typeof PublicIPResolverOptions>;

export type PublicIPLookup = typeof publicIpv4;

/**
 * Resolves the public ip through the `public-ip` package (DNS and HTTPS
 * lookups against several well-known services).
 */
export class PublicIPResolver implements IIPResolver {
  readonly name = 'public-ip';

  private lookup: PublicIPLookup;

  constructor(
    readonly type: IPType = IP_TYPE_DEFAULT,
    lookup?: PublicIPLookup,
  ) {
    this.lookup = lookup ?? (type === 'ipv4' ? publicIpv4 : publicIpv6);
  }

  async resolve({signal}: Context): Promise<string> {
    if (signal.aborted) {
      throw new IPResolutionError('Public ip lookup aborted.', {
        cause: signal.reason,
      });
    }

    const lookup = this.lookup({onlyHttps: true});

    const onAbort = (): void => lookup.cancel();

    signal.addEventListener('abort', onAbort, {once: true});

    try {
      return await lookup;
    } catch (error) {
      throw new IPResolutionError(
        `Failed to look up public ${this.type} address: ${getErrorMessage(error)}`,
        {cause: error},
      );
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }
}
