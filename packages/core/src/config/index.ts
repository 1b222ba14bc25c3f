export {
  RESPONSE_POLICY,
  TIMEOUTS_MS,
  MODEL_CONFIG,
  DEFAULT_PORTS,
  getServiceConfig,
  type ServiceConfig,
} from "./settings.js";
