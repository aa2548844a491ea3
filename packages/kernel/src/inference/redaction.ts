/**
 * Redaction of text leaving the device.
 */

export interface RedactionRule {
  readonly pattern: RegExp;
  readonly replacement: string;
}

/** Card numbers, SSN-shaped numbers, and inline passwords. */
export const DEFAULT_REDACTION_RULES: ReadonlyArray<RedactionRule> = [
  { pattern: /\b\d{4}[- ]?\d{4}[- ]?\d{4}[- ]?\d{4}\b/g, replacement: '[REDACTED_CARD]' },
  { pattern: /\b\d{3}[- ]?\d{2}[- ]?\d{4}\b/g, replacement: '[REDACTED_SSN]' },
  { pattern: /password\s*[:=]\s*\S+/gi, replacement: 'password: [REDACTED]' },
];

/**
 * Apply rules in order. Each rule sees the output of the previous one and
 * replaces every match, whether or not its pattern carries the g flag.
 */
export function redact(text: string, rules: ReadonlyArray<RedactionRule>): string {
  return rules.reduce(
    (current, rule) => current.replace(everyMatch(rule.pattern), rule.replacement),
    text,
  );
}

function everyMatch(pattern: RegExp): RegExp {
  return pattern.global ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);
}
