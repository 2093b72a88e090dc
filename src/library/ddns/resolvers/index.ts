import * as x from 'x-value';

import {USER_AGENT_DEFAULT} from '../../common.js';
import type {IIPResolver} from '../ip-resolver.js';

import {EchoIPResolver, EchoIPResolverOptions} from './echo-ip-resolver.js';
import {
  PublicIPResolver,
  PublicIPResolverOptions,
} from './public-ip-resolver.js';

export const ResolverOptions = x.union([
  EchoIPResolverOptions,
  PublicIPResolverOptions,
]);

export type ResolverOptions = x.TypeOf<typeof ResolverOptions>;

export function createIPResolver(
  options: ResolverOptions,
  userAgent = USER_AGENT_DEFAULT,
): IIPResolver {
  switch (options.provider) {
    case 'echo':
      return new EchoIPResolver({url: options.url, userAgent});
    case 'public-ip':
      return new PublicIPResolver(options.type);
  }
}

export * from './echo-ip-resolver.js';
export * from './public-ip-resolver.js';
