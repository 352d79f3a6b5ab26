/**
 * Guard - Framework Hooks
 *
 * Agent frameworks expose different interception points, but most can call
 * something before and after an action. Adapters implement against
 * HookableExecutor; GuardHooks is the guard-backed implementation.
 */
import { PolicyDecision } from '../types';
import { PolicyDeniedError, describeDenial } from '../policy';
import { describeError } from '../utils/errors';
import logger from '../utils/logger';
import { GuardContext, ToolRunResult } from './context';

export interface ActionDescriptor {
  name: string;
  params: Record<string, unknown>;
}

export interface ActionOutcome {
  output?: unknown;
  error?: unknown;
  durationMs: number;
}

export interface HookableExecutor {
  /**
   * Policy decision for the action. The caller checks `allow` and decides
   * whether to run it.
   */
  beforeAction(action: ActionDescriptor): Promise<PolicyDecision>;
  afterAction(action: ActionDescriptor, outcome: ActionOutcome): Promise<void>;
}

export class GuardHooks implements HookableExecutor {
  constructor(private readonly context: GuardContext) {}

  async beforeAction(action: ActionDescriptor): Promise<PolicyDecision> {
    const authorization = await this.context.authorizeTool(action.name, action.params);
    if (authorization.allowed) {
      this.context.analyzeToolUse(action.name, action.params);
    }
    return authorization.decision;
  }

  async afterAction(action: ActionDescriptor, outcome: ActionOutcome): Promise<void> {
    // failed actions are already on the span; only results are reported
    if (outcome.error !== undefined) {
      return;
    }
    await this.context.recordToolResult(action.name, outcome.output, outcome.durationMs);
  }
}

/**
 * For adapters whose host framework can only abort an action by exception.
 *
 * @throws PolicyDeniedError when the decision does not allow the action
 */
export function assertAllowed(decision: PolicyDecision, actionName: string): void {
  if (!decision.allow) {
    throw new PolicyDeniedError(describeDenial(decision, actionName), decision);
  }
}

/**
 * Drive `fn` through a HookableExecutor inside a 'tool' span of `context`.
 * A denied action is returned as blocked without running. Whatever `fn`
 * throws is re-thrown unchanged; a failing afterAction is only logged.
 */
export async function runAction<T>(
  context: GuardContext,
  hooks: HookableExecutor,
  action: ActionDescriptor,
  fn: () => Promise<T> | T,
): Promise<ToolRunResult<T>> {
  const decision = await hooks.beforeAction(action);
  if (!decision.allow) {
    return { status: 'blocked', decision, reason: describeDenial(decision, action.name) };
  }

  const startTime = Date.now();
  let output: T;
  try {
    output = await context.span(action.name, 'tool', () => fn(), { tool_name: action.name });
  } catch (error) {
    await notifyAfterAction(context, hooks, action, { error, durationMs: Date.now() - startTime });
    throw error;
  }

  await notifyAfterAction(context, hooks, action, { output, durationMs: Date.now() - startTime });
  return { status: 'completed', decision, output };
}

async function notifyAfterAction(
  context: GuardContext,
  hooks: HookableExecutor,
  action: ActionDescriptor,
  outcome: ActionOutcome,
): Promise<void> {
  try {
    await hooks.afterAction(action, outcome);
  } catch (error) {
    logger.warn(
      { trace_id: context.trace.trace_id, action: action.name, error: describeError(error) },
      'afterAction hook failed',
    );
  }
}
