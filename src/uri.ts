/**
 * Generic URI syntax check (RFC 3986 section 3).
 *
 * Only syntax is checked: the scheme must be present, every character must be
 * allowed or percent-encoded, and an authority (when present) must be well
 * formed. Nothing is resolved or dereferenced.
 */

const SCHEME = /^[A-Za-z][A-Za-z0-9+.-]*:/;
// unreserved / sub-delims / ":" / "@" / "/" / "?" / "#" / "[" / "]" / "%"
const URI_CHARS = /^[A-Za-z0-9\-._~!$&'()*+,;=:@\/?#[\]%]*$/;
const PCT = /%(?![0-9A-Fa-f]{2})/;
const PORT = /^[0-9]*$/;
const REG_NAME = /^[A-Za-z0-9\-._~!$&'()*+,;=%]*$/;
const IP_LITERAL = /^\[(?:[0-9A-Fa-f:.]+|v[0-9A-Fa-f]+\.[A-Za-z0-9\-._~!$&'()*+,;=:]+)\]$/;

/** Returns a reason the string is not a URI, or undefined if it is one */
export function uriSyntaxError(value: string): string | undefined {
  const scheme = SCHEME.exec(value);
  if (!scheme) return 'missing or malformed scheme';
  if (!URI_CHARS.test(value)) return 'contains characters not allowed in a URI';
  if (PCT.test(value)) return 'malformed percent-encoding';

  const rest = value.slice(scheme[0].length);
  const hash = rest.indexOf('#');
  if (hash !== -1 && rest.indexOf('#', hash + 1) !== -1) return 'more than one fragment delimiter';

  const beforeFragment = hash === -1 ? rest : rest.slice(0, hash);
  let path = beforeFragment;

  if (beforeFragment.startsWith('//')) {
    const afterSlashes = beforeFragment.slice(2);
    const end = afterSlashes.search(/[\/?]/);
    const authority = end === -1 ? afterSlashes : afterSlashes.slice(0, end);
    path = end === -1 ? '' : afterSlashes.slice(end);
    const reason = authorityError(authority);
    if (reason) return reason;
  }

  if (/[[\]]/.test(path) || (hash !== -1 && /[[\]]/.test(rest.slice(hash + 1)))) {
    return 'square brackets are only allowed around an IP literal host';
  }
  return undefined;
}

function authorityError(authority: string): string | undefined {
  const at = authority.lastIndexOf('@');
  const userinfo = at === -1 ? '' : authority.slice(0, at);
  const hostPort = at === -1 ? authority : authority.slice(at + 1);
  if (/[@[\]]/.test(userinfo)) return 'malformed userinfo';

  let host = hostPort;
  let port = '';
  if (hostPort.startsWith('[')) {
    const close = hostPort.indexOf(']');
    if (close === -1) return 'unterminated IP literal';
    host = hostPort.slice(0, close + 1);
    const after = hostPort.slice(close + 1);
    if (after !== '' && !after.startsWith(':')) return 'malformed authority';
    port = after.slice(1);
    if (!IP_LITERAL.test(host)) return 'malformed IP literal';
  } else {
    const colon = hostPort.lastIndexOf(':');
    if (colon !== -1) {
      host = hostPort.slice(0, colon);
      port = hostPort.slice(colon + 1);
    }
    if (!REG_NAME.test(host)) return 'malformed host';
  }
  if (!PORT.test(port)) return 'port must be numeric';
  return undefined;
}

/** Whether the string is syntactically a URI with a scheme */
export function isUri(value: string): boolean {
  return uriSyntaxError(value) === undefined;
}
