export {
  getDefaultLocale,
  getNodeEnv,
  isDevelopment,
  isProduction,
  isTest,
  parseEnv,
  resetEnvCache,
  type ValidatedEnv,
} from './config.js';
