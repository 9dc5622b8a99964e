import type { ResponseHeaders } from "../transport/types";

const JSESSIONID = /(JSESSIONID=[A-Za-z0-9._-]*)/;

function headerValues(headers: ResponseHeaders): string[] {
  return Object.values(headers).flatMap((value) => (Array.isArray(value) ? value : [value]));
}

/**
 * The `JSESSIONID=...` pair from any response header, typically
 * `Set-Cookie`.
 */
export function extractJsessionId(headers: ResponseHeaders): string | undefined {
  for (const value of headerValues(headers)) {
    const match = JSESSIONID.exec(value);
    if (match?.[1]) {
      return match[1];
    }
  }
  return undefined;
}

/**
 * `name=value` pairs of every `Set-Cookie` header, without attributes.
 */
export function parseSetCookie(headers: ResponseHeaders): Record<string, string> {
  const raw = headers["set-cookie"];
  const cookies: Record<string, string> = {};
  for (const line of raw === undefined ? [] : Array.isArray(raw) ? raw : [raw]) {
    const pair = line.split(";", 1)[0] ?? "";
    const separator = pair.indexOf("=");
    if (separator > 0) {
      cookies[pair.slice(0, separator).trim()] = pair.slice(separator + 1).trim();
    }
  }
  return cookies;
}

/**
 * Request headers that carry the session of a bootstrap response on to the
 * next request: `["Cookie: JSESSIONID=..."]`, or nothing.
 */
export function sessionHeaders(headers: ResponseHeaders): string[] {
  const session = extractJsessionId(headers);
  return session ? [`Cookie: ${session}`] : [];
}
