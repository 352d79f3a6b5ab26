/**
 * Detection Patterns
 *
 * Fixed pattern sets for security-signal detection. Exact-string and regex
 * matching only; nothing here is learned or scored.
 */

/**
 * Prompt-injection phrases. Checked in order; the first match wins.
 */
export const INJECTION_PATTERNS: readonly RegExp[] = [
  /ignore\s+(all\s+)?(previous|all|above|prior)\s+(instructions?|prompts?)/i,
  /disregard\s+(your|all|previous)\s+(rules?|instructions?)/i,
  /you\s+are\s+now\s+(a|an|in)\b/i,
  /pretend\s+(you're?|to\s+be)/i,
  /roleplay\s+as/i,
  /jailbreak/i,
  /DAN\s+mode/i,
  /\[system\]/i,
  /```\s*(system|assistant)/i,
];

export type PiiType = 'ssn' | 'credit_card' | 'email' | 'phone' | 'api_key';

/**
 * One pattern per PII category, in check order. Stored without the global
 * flag; counting uses a global copy.
 */
export const PII_PATTERNS: ReadonlyArray<{ type: PiiType; pattern: RegExp }> = [
  { type: 'ssn', pattern: /\b\d{3}-\d{2}-\d{4}\b/i },
  { type: 'credit_card', pattern: /\b\d{4}[\s-]?\d{4}[\s-]?\d{4}[\s-]?\d{4}\b/i },
  { type: 'email', pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/i },
  { type: 'phone', pattern: /\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/i },
  { type: 'api_key', pattern: /\b(sk-|api[_-]?key|bearer\s+)[a-zA-Z0-9]{20,}\b/i },
];

/**
 * Tool names (case-insensitive substrings) classified as sensitive.
 */
export const DANGEROUS_TOOLS: readonly string[] = [
  'execute_code',
  'run_shell',
  'file_write',
  'delete',
  'database_query',
  'http_request',
  'send_email',
];

/**
 * Substrings in tool parameters that indicate privilege escalation.
 */
export const PRIVILEGE_MARKERS: readonly string[] = ['sudo', 'admin'];

export const SNIPPET_LENGTH = 200;

/**
 * Count every match of a pattern in `text`.
 */
export function countMatches(pattern: RegExp, text: string): number {
  const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
  return text.match(new RegExp(pattern.source, flags))?.length ?? 0;
}
