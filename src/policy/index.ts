/**
 * Policy
 *
 * - PolicyGateway (pre-action checks, fail-open/fail-closed)
 * - Decision construction, parsing and denial messages
 * - Policy errors
 */

export { PolicyGateway, DEFAULT_POLICY_TIMEOUT_MS } from './gateway';
export type { PolicyClient, PolicyGatewayOptions, EvaluationRequest } from './gateway';

export {
  buildDecision,
  allowAll,
  parsePolicyResponse,
  fallbackDecision,
  describeDenial,
} from './decision';
export type { FailMode } from './decision';

export { PolicyTimeoutError, PolicyResponseError, PolicyDeniedError } from './errors';
