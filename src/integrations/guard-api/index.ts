export { GuardApiClient, API_PATHS, SDK_VERSION_HEADER } from './client';
export type { GuardApiClientOptions } from './client';
export { traceToWire, spanToWire, signalToWire } from './wire';
export * from './types';
