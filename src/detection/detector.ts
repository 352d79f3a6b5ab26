/**
 * Signal Detector
 *
 * Pattern-based classification of prompts, outputs and tool calls into
 * security signals. Detection is advisory: it never blocks, it only enriches
 * the active trace. Signals come back in pattern-check order.
 */
import { SecuritySignal } from '../types';
import {
  DANGEROUS_TOOLS,
  INJECTION_PATTERNS,
  PII_PATTERNS,
  PRIVILEGE_MARKERS,
  SNIPPET_LENGTH,
  countMatches,
} from './patterns';
import { createSignal } from './signals';

export class SignalDetector {
  /**
   * Injection check stops at the first matching pattern (one injection
   * signal per call at most). Every PII category is checked independently.
   */
  analyzePrompt(prompt: string): SecuritySignal[] {
    const signals: SecuritySignal[] = [];

    const injection = INJECTION_PATTERNS.find((pattern) => pattern.test(prompt));
    if (injection) {
      signals.push(
        createSignal({
          type: 'injection_attempt',
          severity: 'high',
          title: 'Potential Prompt Injection Detected',
          description: `Pattern matched: ${injection.source}`,
          evidence: {
            prompt_snippet: Array.from(prompt).slice(0, SNIPPET_LENGTH).join(''),
            pattern: injection.source,
          },
        }),
      );
    }

    for (const { type, pattern } of PII_PATTERNS) {
      if (pattern.test(prompt)) {
        signals.push(
          createSignal({
            type: 'data_exfiltration',
            severity: 'medium',
            title: `Potential ${type.toUpperCase()} in Prompt`,
            description: `Detected ${type} pattern in user input`,
            evidence: { pii_type: type },
          }),
        );
      }
    }

    return signals;
  }

  /**
   * PII in model output is confirmed leakage, hence the higher severity.
   */
  analyzeOutput(output: string): SecuritySignal[] {
    const signals: SecuritySignal[] = [];

    for (const { type, pattern } of PII_PATTERNS) {
      const count = countMatches(pattern, output);
      if (count > 0) {
        signals.push(
          createSignal({
            type: 'data_exfiltration',
            severity: 'high',
            title: `${type.toUpperCase()} Exposure in Output`,
            description: `Detected ${count} instance(s) of ${type} in output`,
            evidence: { pii_type: type, count },
          }),
        );
      }
    }

    return signals;
  }

  /**
   * `_output` is accepted so callers can pass the whole tool exchange; output
   * content goes through analyzeOutput instead.
   */
  analyzeToolUse(
    toolName: string,
    toolParams: Record<string, unknown>,
    _output?: unknown,
  ): SecuritySignal[] {
    const signals: SecuritySignal[] = [];

    const toolLower = toolName.toLowerCase();
    if (DANGEROUS_TOOLS.some((dangerous) => toolLower.includes(dangerous))) {
      signals.push(
        createSignal({
          type: 'tool_abuse',
          severity: 'medium',
          title: `Sensitive Tool Usage: ${toolName}`,
          description: `Tool '${toolName}' is classified as sensitive`,
          evidence: {
            tool_name: toolName,
            param_keys: Object.keys(toolParams),
          },
        }),
      );
    }

    const rendered = stringifyParams(toolParams).toLowerCase();
    if (PRIVILEGE_MARKERS.some((marker) => rendered.includes(marker))) {
      signals.push(
        createSignal({
          type: 'privilege_escalation',
          severity: 'high',
          title: 'Potential Privilege Escalation',
          description: 'Tool parameters contain privilege escalation indicators',
          evidence: { tool_name: toolName },
        }),
      );
    }

    return signals;
  }
}

function stringifyParams(params: Record<string, unknown>): string {
  try {
    return JSON.stringify(params) ?? '';
  } catch {
    // circular or BigInt parameters: fall back to the keys and primitive values
    return Object.entries(params)
      .map(([key, value]) => `${key}=${String(value)}`)
      .join(',');
  }
}
