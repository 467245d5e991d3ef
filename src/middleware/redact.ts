const SECRET_HEADERS = new Set([
  'authorization',
  'proxy-authorization',
  'x-api-key',
  'api-key',
  'cookie',
]);

const SECRET_QUERY_PARAMS = new Set(['key', 'api_key', 'apikey', 'access_token', 'token']);

export const REDACTED = '***';

export function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    result[name] = SECRET_HEADERS.has(name.toLowerCase()) ? REDACTED : value;
  }
  return result;
}

export function redactUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url.replace(/([?&](?:key|api_key|apikey|access_token|token)=)[^&#]*/gi, `$1${REDACTED}`);
  }

  for (const name of [...parsed.searchParams.keys()]) {
    if (SECRET_QUERY_PARAMS.has(name.toLowerCase())) {
      parsed.searchParams.set(name, REDACTED);
    }
  }
  if (parsed.password) parsed.password = REDACTED;
  return parsed.toString();
}

/**
 * Replace every secret header value and URL key found in `text` with the
 * mask. Used for command lines and error details that may echo them back.
 */
export function redactText(text: string, headers: Record<string, string>, url?: string): string {
  let result = text;
  for (const [name, value] of Object.entries(headers)) {
    if (!SECRET_HEADERS.has(name.toLowerCase()) || value.length === 0) continue;
    result = result.split(value).join(REDACTED);
    const token = value.replace(/^(Bearer|Basic)\s+/i, '');
    if (token.length > 0 && token !== value) {
      result = result.split(token).join(REDACTED);
    }
  }
  if (url) {
    result = result.split(url).join(redactUrl(url));
  }
  return result;
}

export interface RequestSummary {
  url: string;
  headers: Record<string, string>;
  bodyLength: number;
}

export function describeRequest(request: {
  url: string;
  headers: Record<string, string>;
  body: string;
}): RequestSummary {
  return {
    url: redactUrl(request.url),
    headers: redactHeaders(request.headers),
    bodyLength: request.body.length,
  };
}
