/**
 * @packageDocumentation
 * @module @crawl-relay/adapter-axios
 *
 * Axios transport for crawl-relay. Use it when you want axios features such
 * as interceptors or a shared, preconfigured instance.
 */

export { default, toAxiosProxy } from "./axios-transport";
