/**
 * Transport layer exports.
 */

export * from './types.js';
export { FetchTransport, createFetchTransport } from './fetch-transport.js';
export { TransportClient, type TransportClientOptions, type TransportCall } from './client.js';
