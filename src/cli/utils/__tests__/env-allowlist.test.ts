import { describe, it, expect, afterEach } from 'vitest';
import { getAllowedEnv, getAllowedEnvNames } from '../env-allowlist.js';

describe('env-allowlist.ts', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('always allows PATH and HOME', () => {
    const names = getAllowedEnvNames();
    expect(names).toContain('PATH');
    expect(names).toContain('HOME');
  });

  it('passes prefixed variables and drops everything else', () => {
    process.env = {
      PATH: '/usr/bin',
      RULEGEN_DEBUG: '1',
      GIT_TERMINAL_PROMPT: '0',
      SECRET_TOKEN: 'test-secret',
    };
    const env = getAllowedEnv();
    expect(env.PATH).toBe('/usr/bin');
    expect(env.RULEGEN_DEBUG).toBe('1');
    expect(env.GIT_TERMINAL_PROMPT).toBe('0');
    expect(env.SECRET_TOKEN).toBeUndefined();
  });
});
