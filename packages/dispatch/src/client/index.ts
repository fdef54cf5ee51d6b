/**
 * @switchyard/dispatch - Clients
 */

export {
  defineClient,
  type ClientContract,
  type MethodDefinition,
  type MethodDefinitions,
} from "./define.js";
export { ClientRegistry, normalizeServiceName, normalizeUrl, normalizePath } from "./registry.js";
export {
  createClient,
  expandPath,
  encodeQuery,
  buildLogicalRequest,
  decodeResponse,
  type CallArgs,
  type ClientMethod,
  type ClientOf,
  type CreateClientOptions,
  type QueryValue,
  type ResponseOf,
} from "./create.js";
