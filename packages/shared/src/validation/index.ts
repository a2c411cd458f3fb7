/**
 * Validation exports
 * @module @replica-drill/shared/validation
 */

export {
  validateDrillConfig,
  resolveDrillConfig,
  mergeConfigSources,
  isRecord,
  type DrillConfigSource,
} from './config-validation';
