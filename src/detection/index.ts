export { SignalDetector } from './detector';
export { createSignal, markMitigated } from './signals';
export {
  INJECTION_PATTERNS,
  PII_PATTERNS,
  DANGEROUS_TOOLS,
  PRIVILEGE_MARKERS,
  SNIPPET_LENGTH,
  countMatches,
} from './patterns';
export type { PiiType } from './patterns';
