/**
 * Bastion Runtime Host — Configuration
 *
 * `<home>/config.json` is optional. A missing file yields the defaults; a
 * file that is not JSON or does not match the schema is a ConfigError, never
 * silently replaced by defaults.
 *
 * Example:
 *
 *   {
 *     "redaction": {
 *       "use_defaults": true,
 *       "patterns": [{ "pattern": "acct-\\d+", "flags": "g", "replacement": "[ACCOUNT]" }]
 *     },
 *     "sandbox": { "journal": true },
 *     "scrypt": { "N": 16384, "r": 8, "p": 1 }
 *   }
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { BastionError, DEFAULT_REDACTION_RULES } from '@bastion/kernel';
import type { RedactionRule } from '@bastion/kernel';
import { DEFAULT_SCRYPT_COST } from './crypto/aes-gcm.js';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const RedactionPatternSchema = z
  .object({
    pattern: z.string().min(1),
    flags: z
      .string()
      .regex(/^[gimsu]*$/, 'flags may only contain g, i, m, s, u')
      .default('g'),
    replacement: z.string(),
  })
  .superRefine((value, ctx) => {
    try {
      new RegExp(value.pattern, value.flags);
    } catch (err: unknown) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err instanceof Error ? err.message : 'invalid regular expression',
        path: ['pattern'],
      });
    }
  });

export const ConfigSchema = z
  .object({
    redaction: z
      .object({
        use_defaults: z.boolean().default(true),
        patterns: z.array(RedactionPatternSchema).default([]),
      })
      .strict()
      .default({}),
    sandbox: z
      .object({
        journal: z.boolean().default(true),
      })
      .strict()
      .default({}),
    scrypt: z
      .object({
        N: z
          .number()
          .int()
          .min(1024)
          .refine((n) => (n & (n - 1)) === 0, 'N must be a power of two')
          .default(DEFAULT_SCRYPT_COST.N),
        r: z.number().int().min(1).default(DEFAULT_SCRYPT_COST.r),
        p: z.number().int().min(1).default(DEFAULT_SCRYPT_COST.p),
      })
      .strict()
      .default({}),
  })
  .strict();

export type BastionConfig = z.infer<typeof ConfigSchema>;

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class ConfigError extends BastionError {
  readonly path: string;
  readonly issues: ReadonlyArray<string>;

  constructor(path: string, issues: ReadonlyArray<string>) {
    super('CONFIG_INVALID', `Invalid configuration at ${path}: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.path = path;
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/** Validate an already-parsed config value. */
export function parseConfig(input: unknown, path: string): BastionConfig {
  const parsed = ConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      path,
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      ),
    );
  }
  return parsed.data;
}

/**
 * @throws {ConfigError} when the file exists but is unreadable or invalid
 */
export function loadConfig(path: string): BastionConfig {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return parseConfig({}, path);
    }
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err: unknown) {
    throw new ConfigError(path, [err instanceof Error ? err.message : 'not valid JSON']);
  }
  return parseConfig(json, path);
}

/** Configured patterns run after the built-in ones when both are enabled. */
export function redactionRules(config: BastionConfig): ReadonlyArray<RedactionRule> {
  const custom = config.redaction.patterns.map((p) => ({
    pattern: new RegExp(p.pattern, p.flags),
    replacement: p.replacement,
  }));
  return config.redaction.use_defaults ? [...DEFAULT_REDACTION_RULES, ...custom] : custom;
}
