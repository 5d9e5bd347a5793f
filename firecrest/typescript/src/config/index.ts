export {
  DEFAULT_TIMEOUT,
  DEFAULT_USER_AGENT,
  FirecrestConfigBuilder,
  configFromEnv,
  resolveConfig,
  validateConfig,
  type FirecrestConfig,
  type PartialFirecrestConfig,
} from './config.js';
