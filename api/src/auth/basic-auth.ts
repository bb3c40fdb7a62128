import { createHash, timingSafeEqual } from 'crypto';

export interface BasicCredentials {
  username: string;
  password: string;
}

const BASIC_PREFIX = 'Basic ';
const BASE64_TOKEN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Decode a `Basic base64(username:password)` header value.
 * Returns null for anything malformed; the password keeps any further colons.
 */
export function decodeBasicAuth(header: string | undefined): BasicCredentials | null {
  if (!header || !header.startsWith(BASIC_PREFIX)) return null;

  const token = header.slice(BASIC_PREFIX.length);
  if (!BASE64_TOKEN.test(token) || token.length % 4 !== 0) return null;

  let decoded: string;
  try {
    decoded = new TextDecoder('utf-8', { fatal: true }).decode(Buffer.from(token, 'base64'));
  } catch {
    return null; // not UTF-8
  }

  const sep = decoded.indexOf(':');
  if (sep < 0) return null;
  return { username: decoded.slice(0, sep), password: decoded.slice(sep + 1) };
}

// Hashing first gives equal-length buffers, which timingSafeEqual requires.
function safeEqual(a: string, b: string): boolean {
  const digest = (s: string) => createHash('sha256').update(s, 'utf8').digest();
  return timingSafeEqual(digest(a), digest(b));
}

/** True when the header carries exactly the expected username and password. */
export function verifyBasicAuth(header: string | undefined, expected: BasicCredentials): boolean {
  const given = decodeBasicAuth(header);
  if (!given) return false;
  const userOk = safeEqual(given.username, expected.username);
  const passOk = safeEqual(given.password, expected.password);
  return userOk && passOk;
}

export function encodeBasicAuth({ username, password }: BasicCredentials): string {
  return `${BASIC_PREFIX}${Buffer.from(`${username}:${password}`, 'utf8').toString('base64')}`;
}
