import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { SchemaValidationCache } from '../schemas';
import { formatAjvErrors } from '../validation';
import { DetailedValidationError } from '../errors';
import { createLogger } from '../logger';
import type { EngineConfig, EngineConfigDocument } from './engine_config.types';

const logger = createLogger('[EngineConfig] ');

/** Bundled default tables, packages/core/config/engine_config.yaml */
export const DEFAULT_ENGINE_CONFIG_PATH = path.resolve(__dirname, '..', '..', 'config', 'engine_config.yaml');

/** Environment variable naming a deployment override file */
export const ENGINE_CONFIG_ENV = 'TASKING_ENGINE_CONFIG';

const BUILT_IN_OPTIONALS: Pick<EngineConfig, 'riskThresholds' | 'recommendedActions' | 'maxHierarchyDepth' | 'descriptionMinLength'> = {
  riskThresholds: { red: 0.8, amber: 0.6 },
  recommendedActions: ['Confirm staffing plan', 'Send reminder via notification service'],
  maxHierarchyDepth: 32,
  descriptionMinLength: 30,
};

let defaultConfig: EngineConfig | null = null;

/**
 * Validates a parsed config document and fills optional keys.
 * @throws DetailedValidationError when the document does not match the schema
 */
export function parseEngineConfig(document: unknown): EngineConfig {
  const validate = SchemaValidationCache.getBundledValidator<EngineConfigDocument>('engine_config_schema');
  if (!validate(document)) {
    throw new DetailedValidationError('EngineConfig', formatAjvErrors(validate.errors));
  }

  const riskThresholds = document.riskThresholds ?? BUILT_IN_OPTIONALS.riskThresholds;
  if (riskThresholds.red < riskThresholds.amber) {
    throw new DetailedValidationError('EngineConfig', [
      { field: '/riskThresholds/red', message: 'must be >= riskThresholds.amber', value: riskThresholds.red },
    ]);
  }

  return {
    keywordSections: document.keywordSections.map(row => ({
      keyword: row.keyword.toLowerCase(),
      orgUnitId: row.orgUnitId,
    })),
    originatorWeights: document.originatorWeights.map(row => ({ ...row })),
    defaultOriginatorWeight: document.defaultOriginatorWeight,
    statusWeights: { ...document.statusWeights },
    defaultStatusWeight: document.defaultStatusWeight,
    riskThresholds: { ...riskThresholds },
    recommendedActions: [...(document.recommendedActions ?? BUILT_IN_OPTIONALS.recommendedActions)],
    maxHierarchyDepth: document.maxHierarchyDepth ?? BUILT_IN_OPTIONALS.maxHierarchyDepth,
    descriptionMinLength: document.descriptionMinLength ?? BUILT_IN_OPTIONALS.descriptionMinLength,
  };
}

/**
 * Loads an engine config from a YAML or JSON file.
 */
export function loadEngineConfig(filePath: string): EngineConfig {
  const content = fs.readFileSync(filePath, 'utf8');
  const config = parseEngineConfig(yaml.load(content));
  logger.debug(`Loaded engine config from ${filePath}`);
  return config;
}

/**
 * The bundled defaults, loaded once.
 */
export function getDefaultEngineConfig(): EngineConfig {
  if (!defaultConfig) {
    defaultConfig = loadEngineConfig(DEFAULT_ENGINE_CONFIG_PATH);
  }
  return defaultConfig;
}

/**
 * Picks the deployment config: the file named by TASKING_ENGINE_CONFIG when
 * set, otherwise the bundled defaults.
 */
export function resolveEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const overridePath = env[ENGINE_CONFIG_ENV];
  if (overridePath) {
    logger.info(`Using engine config override ${overridePath}`);
    return loadEngineConfig(path.resolve(overridePath));
  }
  return getDefaultEngineConfig();
}
