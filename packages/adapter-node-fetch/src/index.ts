/**
 * @packageDocumentation
 * @module @crawl-relay/adapter-node-fetch
 *
 * node-fetch transport for crawl-relay.
 */

export { default } from "./node-fetch-transport";
export type { NodeFetchTransportOptions } from "./node-fetch-transport";
