export {
  DEFAULT_ENGINE_CONFIG_PATH,
  ENGINE_CONFIG_ENV,
  parseEngineConfig,
  loadEngineConfig,
  getDefaultEngineConfig,
  resolveEngineConfig
} from './engine_config';
export type {
  EngineConfig,
  EngineConfigDocument,
  KeywordSection,
  OriginatorWeight,
  RiskThresholds
} from './engine_config.types';
