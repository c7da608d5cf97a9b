import { describe, it, expect } from 'vitest';

import { readCookie } from '../src/spond-link/cookies';

describe('readCookie', () => {
  it('finds a cookie among others', () => {
    expect(readCookie('sessionid=abc; csrftoken=test-csrf; theme=dark', 'csrftoken')).toBe('test-csrf');
  });

  it('keeps "=" inside the value and decodes it', () => {
    expect(readCookie('csrftoken=a%3Db=c', 'csrftoken')).toBe('a=b=c');
  });

  it('does not match on a name prefix', () => {
    expect(readCookie('xcsrftoken=nope', 'csrftoken')).toBeNull();
  });

  it('returns null for a value that cannot be decoded', () => {
    expect(readCookie('csrftoken=%E0%A4%A; theme=dark', 'csrftoken')).toBeNull();
  });

  it('returns null for an empty cookie string', () => {
    expect(readCookie('', 'csrftoken')).toBeNull();
  });
});
