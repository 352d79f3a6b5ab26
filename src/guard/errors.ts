/**
 * Guard - Error Classes
 */
import { GuardError } from '../utils/errors';

/**
 * A guarded action did not settle within its timeout. The action's span is
 * closed with status 'error' before this is thrown.
 */
export class ActionTimeoutError extends GuardError {
  constructor(actionName: string, timeoutMs: number) {
    super(`Action '${actionName}' timed out after ${timeoutMs}ms`, 'ACTION_TIMEOUT', 504, {
      action: actionName,
      timeoutMs,
    });
    this.name = 'ActionTimeoutError';
  }
}
