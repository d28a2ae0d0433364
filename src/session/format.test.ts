import { describe, expect, it } from 'vitest';
import type { Session, SessionId } from '@/core/types.js';
import { bindSession, formatSession, shellQuote } from './format.js';

const session: Session = {
  id: 'session-test' as SessionId,
  documentPath: '/tmp/secrets.env.enc',
  loadedAt: new Date('2026-01-01T00:00:00.000Z'),
  variables: { API_KEY: 'test-secret', QUOTE: "it's" },
};

describe('shellQuote', () => {
  it('wraps in single quotes and escapes embedded ones', () => {
    expect(shellQuote('plain')).toBe("'plain'");
    expect(shellQuote("it's")).toBe(`'it'\\''s'`);
    expect(shellQuote('$HOME `x`')).toBe("'$HOME `x`'");
  });
});

describe('formatSession', () => {
  it('renders export lines for shells', () => {
    expect(formatSession(session, 'shell')).toBe(`export API_KEY='test-secret'\nexport QUOTE='it'\\''s'\n`);
  });

  it('renders dotenv text', () => {
    expect(formatSession(session, 'dotenv')).toBe(`API_KEY=test-secret\nQUOTE=it's\n`);
  });

  it('renders a JSON object', () => {
    expect(JSON.parse(formatSession(session, 'json'))).toEqual({ API_KEY: 'test-secret', QUOTE: "it's" });
  });
});

describe('bindSession', () => {
  it('layers session variables over the environment without changing it', () => {
    const env = { PATH: '/usr/bin', API_KEY: 'stale' };

    expect(bindSession(session, env)).toEqual({ PATH: '/usr/bin', API_KEY: 'test-secret', QUOTE: "it's" });
    expect(env).toEqual({ PATH: '/usr/bin', API_KEY: 'stale' });
  });
});
