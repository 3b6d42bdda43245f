import { describe, it, expect } from 'vitest';

import { maskPassword, parseCredentials } from './credentials.js';

describe('parseCredentials', () => {
  it('should return undefined for an empty field', () => {
    expect(parseCredentials('')).toBeUndefined();
    expect(parseCredentials('   \n ')).toBeUndefined();
    expect(parseCredentials(null)).toBeUndefined();
  });

  it('should split the plain form on the first colon only', () => {
    expect(parseCredentials('agent@example.com:pa:ss')).toEqual({
      username: 'agent@example.com',
      password: 'pa:ss',
    });
  });

  it('should treat a single line whose username looks like a label as the plain form', () => {
    expect(parseCredentials('user:hunter2')).toEqual({ username: 'user', password: 'hunter2' });
    expect(parseCredentials('login:x')).toEqual({ username: 'login', password: 'x' });
  });

  it('should read labelled lines in any order', () => {
    expect(parseCredentials('Password: test-secret\nEmail: agent@example.com')).toEqual({
      username: 'agent@example.com',
      password: 'test-secret',
    });
  });

  it('should keep a lone username when there is no separator', () => {
    expect(parseCredentials('agent')).toEqual({ username: 'agent', password: '' });
  });
});

describe('maskPassword', () => {
  it('should hide the password but keep its length', () => {
    expect(maskPassword({ username: 'agent', password: 'test' })).toBe('agent / ****');
    expect(maskPassword(undefined)).toBe('none');
  });
});
