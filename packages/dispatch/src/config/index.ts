/**
 * @switchyard/dispatch - Configuration
 */

export {
  DEFAULT_SERVICE_OPTIONS,
  DEFAULT_CONFIG_KEY,
  CLIENT_CONFIG_ENV,
  defaultErrorDecoder,
} from "./defaults.js";
export { ComponentRegistry } from "./components.js";
export { resolveServiceOptions } from "./merge.js";
export {
  parseServiceProperties,
  parseClientProperties,
  loadClientPropertiesFromEnv,
} from "./properties.js";
export { ServiceConfigStore, type ServiceConfigStoreOptions } from "./store.js";
