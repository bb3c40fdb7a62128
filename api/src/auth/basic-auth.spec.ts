import { decodeBasicAuth, encodeBasicAuth, verifyBasicAuth } from './basic-auth';

const expected = { username: 'admin', password: 'test-secret' };
const b64 = (s: string) => Buffer.from(s, 'utf8').toString('base64');

describe('basic auth', () => {
  it('accepts the configured pair', () => {
    expect(verifyBasicAuth(`Basic ${b64('admin:test-secret')}`, expected)).toBe(true);
    expect(verifyBasicAuth(encodeBasicAuth(expected), expected)).toBe(true);
  });

  it('rejects a wrong username or password', () => {
    expect(verifyBasicAuth(`Basic ${b64('root:test-secret')}`, expected)).toBe(false);
    expect(verifyBasicAuth(`Basic ${b64('admin:nope')}`, expected)).toBe(false);
    expect(verifyBasicAuth(`Basic ${b64('admin:test-secret-2')}`, expected)).toBe(false);
  });

  it('keeps colons after the first one in the password', () => {
    expect(decodeBasicAuth(`Basic ${b64('admin:a:b:c')}`)).toEqual({ username: 'admin', password: 'a:b:c' });
    expect(verifyBasicAuth(`Basic ${b64('admin:a:b')}`, { username: 'admin', password: 'a:b' })).toBe(true);
  });

  it.each([
    ['missing header', undefined],
    ['empty header', ''],
    ['other scheme', `Bearer ${b64('admin:test-secret')}`],
    ['lower-case scheme', `basic ${b64('admin:test-secret')}`],
    ['bad base64', 'Basic !!!not-base64!!!'],
    ['truncated base64', 'Basic YWRtaW46dGVzdC1zZWNyZXQ'],
    ['no colon', `Basic ${b64('admintest-secret')}`],
    ['invalid utf-8', `Basic ${Buffer.from([0xff, 0xfe, 0x3a, 0x41]).toString('base64')}`],
  ])('treats %s as a failed login', (_label, header) => {
    expect(decodeBasicAuth(header)).toBeNull();
    expect(verifyBasicAuth(header, expected)).toBe(false);
  });
});
