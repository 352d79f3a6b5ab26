/**
 * Guard - Invocation Context
 *
 * Everything one guarded invocation needs, passed explicitly down the call
 * chain: the trace being recorded, the recorder that owns its span stack, and
 * the policy and detection services. There is no ambient "current trace".
 */
import { PolicyDecision, SecuritySignal, Span, SpanType, Trace } from '../types';
import { SignalDetector, createSignal } from '../detection';
import { PolicyGateway, describeDenial } from '../policy';
import { TraceRecorder } from '../tracing';
import { describeError } from '../utils/errors';
import { withTimeout } from '../utils/timeout';
import logger from '../utils/logger';
import { ActionTimeoutError } from './errors';

/**
 * Records a completed tool invocation with the guard API. GuardApiClient
 * implements it.
 */
export interface InvocationReporter {
  postInvoke(params: {
    agentId: string;
    toolName: string;
    result: unknown;
    durationMs: number;
    sessionId: string;
  }): Promise<void>;
}

export interface GuardServices {
  agentId: string;
  enabled: boolean;
  gateway: PolicyGateway;
  detector: SignalDetector;
  reporter?: InvocationReporter;
}

export type Authorization =
  | { allowed: true; decision: PolicyDecision }
  | { allowed: false; decision: PolicyDecision; reason: string };

export type ToolRunResult<T> =
  | { status: 'blocked'; decision: PolicyDecision; reason: string }
  | { status: 'completed'; decision: PolicyDecision; output: T };

export interface RunToolOptions {
  /** Reject with ActionTimeoutError when the tool has not settled in time */
  timeoutMs?: number;
}

export class GuardContext {
  constructor(
    readonly trace: Trace,
    readonly recorder: TraceRecorder,
    private readonly services: GuardServices,
  ) {}

  get agentId(): string {
    return this.services.agentId;
  }

  get sessionId(): string {
    return this.trace.session_id;
  }

  /**
   * Run `fn` inside a span of this invocation.
   */
  span<T>(
    name: string,
    type: SpanType,
    fn: (span: Span) => Promise<T> | T,
    attributes?: Record<string, unknown>,
  ): Promise<T> {
    return this.recorder.withSpan(name, type, fn, attributes);
  }

  /**
   * A context for a concurrent sibling task. It records into the same trace
   * with its own span stack.
   */
  branch(): GuardContext {
    return new GuardContext(this.trace, this.recorder.branch(), this.services);
  }

  checkToolAccess(toolName: string, toolParams: Record<string, unknown> = {}): Promise<PolicyDecision> {
    return this.services.gateway.checkToolAccess(
      this.services.agentId,
      toolName,
      toolParams,
      this.trace.session_id,
    );
  }

  addSecuritySignal(signal: SecuritySignal): boolean {
    return this.recorder.addSignal(signal);
  }

  analyzePrompt(prompt: string): SecuritySignal[] {
    return this.attach(this.services.detector.analyzePrompt(prompt));
  }

  analyzeOutput(output: string): SecuritySignal[] {
    return this.attach(this.services.detector.analyzeOutput(output));
  }

  analyzeToolUse(toolName: string, toolParams: Record<string, unknown>, output?: unknown): SecuritySignal[] {
    return this.attach(this.services.detector.analyzeToolUse(toolName, toolParams, output));
  }

  /**
   * Policy check for one tool call, recorded as a 'policy' span. A denial
   * adds a mitigated policy_violation signal to the trace.
   */
  async authorizeTool(toolName: string, toolParams: Record<string, unknown>): Promise<Authorization> {
    const decision = await this.span(
      `policy:${toolName}`,
      'policy',
      async (span) => {
        const result = await this.checkToolAccess(toolName, toolParams);
        span.attributes.decision = result.decision;
        span.attributes.allow = result.allow;
        return result;
      },
      { tool_name: toolName },
    );

    if (decision.allow) {
      return { allowed: true, decision };
    }

    const reason = describeDenial(decision, toolName);
    this.addSecuritySignal(
      createSignal({
        type: 'policy_violation',
        severity: 'high',
        title: `Tool Blocked: ${toolName}`,
        description: reason,
        evidence: {
          tool_name: toolName,
          decision: decision.decision,
          reasons: decision.reasons,
        },
        mitigated: true,
      }),
    );

    logger.warn(
      { trace_id: this.trace.trace_id, tool: toolName, decision: decision.decision },
      'Tool invocation blocked by policy',
    );

    return { allowed: false, decision, reason };
  }

  /**
   * Analyze a tool's output and report the invocation. Reporting is
   * best-effort: a failed post-invoke call is logged, never thrown.
   */
  async recordToolResult(toolName: string, output: unknown, durationMs: number): Promise<void> {
    const rendered = renderOutput(output);
    if (rendered !== undefined) {
      this.analyzeOutput(rendered);
    }

    const reporter = this.services.reporter;
    if (!this.services.enabled || !reporter) {
      return;
    }

    try {
      await reporter.postInvoke({
        agentId: this.services.agentId,
        toolName,
        result: output,
        durationMs,
        sessionId: this.trace.session_id,
      });
    } catch (error) {
      logger.warn(
        { trace_id: this.trace.trace_id, tool: toolName, error: describeError(error) },
        'Post-invoke report failed',
      );
    }
  }

  /**
   * Guarded tool call: policy check, then the tool inside a 'tool' span,
   * then tool-use and output analysis and the post-invoke report.
   * Errors thrown by `fn` propagate unchanged.
   */
  async runTool<T>(
    toolName: string,
    toolParams: Record<string, unknown>,
    fn: () => Promise<T> | T,
    options: RunToolOptions = {},
  ): Promise<ToolRunResult<T>> {
    const authorization = await this.authorizeTool(toolName, toolParams);
    if (!authorization.allowed) {
      return { status: 'blocked', decision: authorization.decision, reason: authorization.reason };
    }

    this.analyzeToolUse(toolName, toolParams);

    const timeoutMs = options.timeoutMs;
    const startTime = Date.now();
    const output = await this.span(
      toolName,
      'tool',
      () => {
        const run = Promise.resolve().then(fn);
        return timeoutMs === undefined
          ? run
          : withTimeout(run, timeoutMs, () => new ActionTimeoutError(toolName, timeoutMs));
      },
      { tool_name: toolName, param_keys: Object.keys(toolParams) },
    );

    await this.recordToolResult(toolName, output, Date.now() - startTime);

    return { status: 'completed', decision: authorization.decision, output };
  }

  private attach(signals: SecuritySignal[]): SecuritySignal[] {
    for (const signal of signals) {
      this.addSecuritySignal(signal);
    }
    return signals;
  }
}

function renderOutput(output: unknown): string | undefined {
  if (output === undefined || output === null) {
    return undefined;
  }
  if (typeof output === 'string') {
    return output;
  }
  try {
    return JSON.stringify(output);
  } catch {
    return String(output);
  }
}
