import { isIPv6 } from 'node:net';
import { UrlParseError } from '../errors/redaction-errors';
import { type ParsedUrl, type QueryPair } from '../types/redaction';

// scheme ":" ["//" authority] path ["?" query] ["#" fragment]
const URL_COMPONENTS = /^([A-Za-z][A-Za-z0-9+.-]*):(\/\/[^/?#]*)?([^?#]*)(?:\?([^#]*))?(?:#([\s\S]*))?$/;

const ESCAPE_RUN = /(?:%[0-9a-fA-F]{2})+/g;

/**
 * Form-decodes a query name or value. Escapes that do not form valid UTF-8
 * are left as written.
 */
export function decodeQueryComponent(value: string): string {
  return value.replace(/\+/g, ' ').replace(ESCAPE_RUN, (run) => {
    try {
      return decodeURIComponent(run);
    } catch {
      return run;
    }
  });
}

/**
 * application/x-www-form-urlencoded encoding: space becomes "+", everything
 * outside A-Z a-z 0-9 _ . - ~ is percent-encoded.
 */
export function encodeQueryComponent(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%20/g, '+');
}

export function parseQueryPair(raw: string): QueryPair {
  const separator = raw.indexOf('=');
  if (separator === -1) {
    return { raw, name: decodeQueryComponent(raw), value: '', hasValue: false };
  }
  return {
    raw,
    name: decodeQueryComponent(raw.slice(0, separator)),
    value: decodeQueryComponent(raw.slice(separator + 1)),
    hasValue: true,
  };
}

/**
 * Splits a query string on "&" into ordered pairs. Empty segments are kept
 * so that serializeQuery gives back the same text.
 */
export function parseQuery(query: string): QueryPair[] {
  if (query === '') {
    return [];
  }
  return query.split('&').map(parseQueryPair);
}

export function serializeQuery(pairs: readonly QueryPair[]): string {
  return pairs.map((pair) => pair.raw).join('&');
}

// host[:port] after any userinfo, with a bracketed IPv6 literal
const BRACKETED_HOST = /^\[([^[\]]*)\](?::[^[\]]*)?$/;

function assertValidHost(url: string, authority: string): void {
  const hostPort = authority.slice(authority.lastIndexOf('@') + 1);
  if (!hostPort.includes('[') && !hostPort.includes(']')) {
    return;
  }

  const bracketed = BRACKETED_HOST.exec(hostPort);
  if (!bracketed) {
    throw new UrlParseError(url, 'unbalanced brackets in host');
  }
  if (!isIPv6(bracketed[1])) {
    throw new UrlParseError(url, `invalid IPv6 literal [${bracketed[1]}]`);
  }
}

/**
 * Decomposes a URL into scheme, authority, path, ";params", query pairs and
 * fragment without normalizing any of them. Only structure is checked: a
 * missing scheme, unbalanced host brackets or a bracketed host that is not
 * an IPv6 address raise UrlParseError. Ports and host names are not
 * validated.
 */
export function parseUrl(url: string): ParsedUrl {
  const match = URL_COMPONENTS.exec(url);
  if (!match) {
    throw new UrlParseError(url, 'missing scheme');
  }

  const [, scheme, authority, fullPath, query, fragment] = match;
  if (authority !== undefined) {
    assertValidHost(url, authority.slice(2));
  }

  // ";params" belongs to the last path segment only
  let path = fullPath;
  let params: string | undefined;
  const semicolon = fullPath.indexOf(';', fullPath.lastIndexOf('/') + 1);
  if (semicolon !== -1) {
    path = fullPath.slice(0, semicolon);
    params = fullPath.slice(semicolon + 1);
  }

  return {
    scheme,
    authority: authority === undefined ? undefined : authority.slice(2),
    path,
    params,
    query: query === undefined ? undefined : parseQuery(query),
    fragment,
  };
}

export function serializeUrl(parsed: ParsedUrl): string {
  let url = `${parsed.scheme}:`;
  if (parsed.authority !== undefined) url += `//${parsed.authority}`;
  url += parsed.path;
  if (parsed.params !== undefined) url += `;${parsed.params}`;
  if (parsed.query !== undefined) url += `?${serializeQuery(parsed.query)}`;
  if (parsed.fragment !== undefined) url += `#${parsed.fragment}`;
  return url;
}
