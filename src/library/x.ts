import * as x from 'x-value';

export const Port = x.integerRange<'port'>({min: 1, max: 65535});

export type Port = x.TypeOf<typeof Port>;

/**
 * Either a string in `ms` syntax (e.g. "5m") or a number of seconds.
 */
export const Duration = x.union([x.string, x.number]);

export type Duration = x.TypeOf<typeof Duration>;
