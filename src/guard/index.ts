/**
 * Guard
 *
 * - Guard orchestrator (open/close/scoped traces, exports)
 * - GuardContext (explicit per-invocation context, guarded tool calls)
 * - Framework hooks and Express middleware
 */

export { Guard } from './guard';
export type { GuardOptions, GuardClient, OpenTraceOptions } from './guard';

export { GuardContext } from './context';
export type {
  Authorization,
  GuardServices,
  InvocationReporter,
  RunToolOptions,
  ToolRunResult,
} from './context';

export { GuardHooks, assertAllowed, runAction } from './hooks';
export type { ActionDescriptor, ActionOutcome, HookableExecutor } from './hooks';

export { guardMiddleware, SESSION_ID_HEADER, USER_ID_HEADER } from './middleware';

export { ActionTimeoutError } from './errors';
