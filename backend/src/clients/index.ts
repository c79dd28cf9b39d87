/**
 * External Source Clients
 *
 * HTTP clients for the market-data sources. They return decoded bodies;
 * shape validation belongs to the source adapters.
 */

export { BlsClient, BLS_SUCCESS_STATUS } from './bls.client.js';
export { MetalsClient } from './metals.client.js';
export { FredClient } from './fred.client.js';
export { createSourceHttp, toTransportFailure } from './source.http.js';

export type { BlsClientConfig } from './bls.client.js';
export type { MetalsClientConfig } from './metals.client.js';
export type { FredClientConfig } from './fred.client.js';
export type { SourceClientConfig } from './source.http.js';
