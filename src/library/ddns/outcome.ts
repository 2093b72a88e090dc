export type Outcome =
  | {type: 'updated'}
  | {type: 'unchanged'}
  | {type: 'failed'; detail: string};

/**
 * Response codes of the `nic/update` protocol. Only `good` and `nochg` mean
 * success.
 */
export const RESPONSE_CODE_EXPLANATIONS: Record<string, string> = {
  good: 'the update was successful',
  nochg: 'the supplied ip address is already set for this host',
  nohost: 'the hostname does not exist, or does not have dynamic dns enabled',
  badauth: 'the username / password combination is not valid for the host',
  notfqdn: 'the supplied hostname is not a valid fully-qualified domain name',
  badagent: 'the request is missing a user agent',
  abuse: 'dynamic dns access for the hostname has been blocked',
  911: 'an error happened on the provider end, wait 5 minutes and retry',
};

export function classify(status: number, body: string): Outcome {
  if (status >= 300) {
    return {type: 'failed', detail: `http status ${status}`};
  }

  if (body.includes('good')) {
    return {type: 'updated'};
  }

  if (body.includes('nochg')) {
    return {type: 'unchanged'};
  }

  return {type: 'failed', detail: body};
}

/**
 * Looks up the explanation of the response code a provider body starts with,
 * e.g. "badauth" or "nohost".
 */
export function describeResponseCode(body: string): string | undefined {
  const [code = ''] = body.trim().split(/\s+/, 1);

  return Object.prototype.hasOwnProperty.call(RESPONSE_CODE_EXPLANATIONS, code)
    ? RESPONSE_CODE_EXPLANATIONS[code]
    : undefined;
}
