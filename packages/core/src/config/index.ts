export {
  ContractViolationModeSchema,
  FallibleConfigSchema,
  getConfig,
  configure,
  resetConfig,
  loadConfigFromEnv,
} from './config.js'
export type { ContractViolationMode, FallibleConfig } from './config.js'
