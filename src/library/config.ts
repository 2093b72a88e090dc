import ms from 'ms';
import * as x from 'x-value';

import {getErrorMessage} from './@utils/index.js';
import {USER_AGENT_DEFAULT} from './common.js';
import {ResolverOptions} from './ddns/index.js';
import {ConfigError} from './errors.js';
import {MetricsServerOptions} from './telemetry/index.js';
import {Duration} from './x.js';

export const HostConfig = x.object({
  host: x.string,
  user: x.string,
  password: x.string,
});

export type HostConfig = x.TypeOf<typeof HostConfig>;

export const ConfigFile = x.object({
  interval: Duration,
  hosts: x.array(HostConfig),
  userAgent: x.string.optional(),
  resolver: ResolverOptions.optional(),
  metrics: MetricsServerOptions.optional(),
});

export type ConfigFile = x.TypeOf<typeof ConfigFile>;

export type Host = {
  readonly hostname: string;
  readonly user: string;
  readonly password: string;
};

export type Config = {
  /**
   * Milliseconds between the end of a reconcile pass and the start of the
   * next one.
   */
  readonly interval: number;
  readonly hosts: readonly Host[];
  readonly userAgent: string;
  readonly resolver: ResolverOptions;
  readonly metrics?: MetricsServerOptions;
};

/**
 * Validates a decoded config document and normalizes it into a frozen
 * `Config`. Throws `ConfigError` on any problem.
 */
export function parseConfig(document: unknown): Config {
  let file: ConfigFile;

  try {
    file = ConfigFile.exact().satisfies(document);
  } catch (error) {
    throw new ConfigError(getErrorMessage(error), {cause: error});
  }

  const {
    interval,
    hosts,
    userAgent = USER_AGENT_DEFAULT,
    resolver = {provider: 'echo'},
    metrics,
  } = file;

  if (hosts.length === 0) {
    throw new ConfigError('No hosts configured.');
  }

  if (userAgent.trim() === '') {
    throw new ConfigError('User agent must not be empty.');
  }

  return Object.freeze({
    interval: parseDuration(interval),
    hosts: Object.freeze(hosts.map(parseHost)),
    userAgent,
    resolver,
    ...(metrics && {metrics}),
  });
}

export function parseDuration(duration: Duration): number {
  let value: number | undefined;

  try {
    value = typeof duration === 'string' ? ms(duration) : duration * 1000;
  } catch {
    // `ms` throws on an empty string and returns undefined for other strings
    // it cannot parse.
    value = undefined;
  }

  if (value === undefined || !Number.isFinite(value) || value <= 0) {
    throw new ConfigError(
      `Invalid interval ${JSON.stringify(duration)}, expecting a positive duration.`,
    );
  }

  return value;
}

function parseHost({host, user, password}: HostConfig, index: number): Host {
  for (const [key, value] of [
    ['host', host],
    ['user', user],
    ['password', password],
  ]) {
    if (value.trim() === '') {
      throw new ConfigError(`Host #${index + 1} has an empty "${key}".`);
    }
  }

  return Object.freeze({hostname: host, user, password});
}
