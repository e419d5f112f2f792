export type { ApiClient, RandomSource } from './base';
export { MockApiClient, SimulatedApiError } from './mock-api-client';
export type { MockApiClientOptions, MockItem, MockPayload } from './mock-api-client';
export { ApiClientPool } from './api-client-pool';
export type { ApiClientPoolOptions } from './api-client-pool';
