/**
 * Bastion Runtime Host — Configuration and home resolution tests
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { tmpdir } from 'node:os';
import { DEFAULT_REDACTION_RULES, redact } from '@bastion/kernel';
import { ConfigError, loadConfig, parseConfig, redactionRules } from '../src/config.js';
import { homePaths, resolveHome } from '../src/home.js';

function tempDir(): string {
  return mkdtempSync(join(tmpdir(), 'bastion-cfg-'));
}

describe('loadConfig', () => {
  it('returns defaults when the file is missing', () => {
    const config = loadConfig(join(tempDir(), 'config.json'));
    expect(config).toEqual({
      redaction: { use_defaults: true, patterns: [] },
      sandbox: { journal: true },
      scrypt: { N: 16384, r: 8, p: 1 },
    });
  });

  it('fills omitted fields with defaults', () => {
    const path = join(tempDir(), 'config.json');
    writeFileSync(path, JSON.stringify({ sandbox: { journal: false } }), 'utf-8');
    const config = loadConfig(path);
    expect(config.sandbox.journal).toBe(false);
    expect(config.scrypt.N).toBe(16384);
  });

  it('throws ConfigError for a file that is not JSON', () => {
    const path = join(tempDir(), 'config.json');
    writeFileSync(path, '{oops', 'utf-8');
    expect(() => loadConfig(path)).toThrow(ConfigError);
  });

  it('reports the failing field path', () => {
    try {
      parseConfig({ scrypt: { N: 3000 } }, 'config.json');
      expect.fail('parseConfig accepted a non power of two');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.code).toBe('CONFIG_INVALID');
        expect(err.issues).toContain('scrypt.N: N must be a power of two');
      }
    }
  });

  it('rejects unknown keys', () => {
    expect(() => parseConfig({ telemetry: true }, 'config.json')).toThrow(ConfigError);
  });

  it('has no setting for collaboration size', () => {
    expect(() =>
      parseConfig({ collaboration: { max_participants: 3 } }, 'config.json'),
    ).toThrow(ConfigError);
  });

  it('rejects a pattern that is not a valid regular expression', () => {
    expect(() =>
      parseConfig({ redaction: { patterns: [{ pattern: '(', replacement: 'x' }] } }, 'config.json'),
    ).toThrow(ConfigError);
  });
});

describe('redactionRules', () => {
  it('appends configured patterns to the defaults', () => {
    const config = parseConfig(
      { redaction: { patterns: [{ pattern: 'acct-\\d+', replacement: '[ACCOUNT]' }] } },
      'config.json',
    );
    const rules = redactionRules(config);
    expect(rules).toHaveLength(DEFAULT_REDACTION_RULES.length + 1);
    expect(redact('acct-42 acct-7 password=test-secret', rules)).toBe(
      '[ACCOUNT] [ACCOUNT] password: [REDACTED]',
    );
  });

  it('uses only configured patterns when defaults are off', () => {
    const config = parseConfig(
      { redaction: { use_defaults: false, patterns: [{ pattern: 'secret', flags: 'gi', replacement: '***' }] } },
      'config.json',
    );
    expect(redact('Secret password=x', redactionRules(config))).toBe('*** password=x');
  });

  it('replaces every match when the configured flags omit g', () => {
    const config = parseConfig(
      { redaction: { use_defaults: false, patterns: [{ pattern: 'acct-\\d+', flags: 'i', replacement: '[ACCOUNT]' }] } },
      'config.json',
    );
    expect(redact('ACCT-1 and acct-2', redactionRules(config))).toBe('[ACCOUNT] and [ACCOUNT]');
  });

  it('rejects the sticky flag', () => {
    expect(() =>
      parseConfig({ redaction: { patterns: [{ pattern: 'x', flags: 'gy', replacement: '' }] } }, 'config.json'),
    ).toThrow(ConfigError);
  });
});

describe('resolveHome', () => {
  it('prefers the explicit flag over the environment', () => {
    const flag = tempDir();
    const env = tempDir();
    expect(resolveHome({ home: flag, env: { BASTION_HOME: env } })).toBe(resolve(flag));
  });

  it('falls back to BASTION_HOME', () => {
    const env = tempDir();
    expect(resolveHome({ env: { BASTION_HOME: env } })).toBe(resolve(env));
  });

  it('creates a missing directory', () => {
    const home = join(tempDir(), 'nested', 'home');
    expect(resolveHome({ home, env: {} })).toBe(resolve(home));
    expect(homePaths(resolve(home)).config).toBe(join(resolve(home), 'config.json'));
  });
});
