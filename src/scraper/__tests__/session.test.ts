import { describe, it, expect } from 'vitest';
import { toContextCookies, toSessionCookies } from '../session.js';

describe('toContextCookies', () => {
  it('scopes cookies to the portal host', () => {
    const cookies = toContextCookies(
      [
        { name: 'MoodleSession', value: 'test-session', domain: '.campus.example.edu', path: '/' },
        { name: 'empty', value: '', domain: 'campus.example.edu' },
        { name: 'lang', value: 'en', domain: '' },
      ],
      'https://campus.example.edu:8443/my/'
    );

    expect(cookies).toEqual([
      { name: 'MoodleSession', value: 'test-session', domain: 'campus.example.edu', path: '/' },
      { name: 'lang', value: 'en', domain: 'campus.example.edu', path: '/' },
    ]);
  });
});

describe('toSessionCookies', () => {
  it('keeps name, value, domain and path', () => {
    expect(
      toSessionCookies([
        {
          name: 'MoodleSession',
          value: 'test-session',
          domain: 'campus.example.edu',
          path: '/',
          expires: -1,
          httpOnly: true,
          secure: true,
          sameSite: 'Lax',
        },
      ])
    ).toEqual([{ name: 'MoodleSession', value: 'test-session', domain: 'campus.example.edu', path: '/' }]);
  });
});
