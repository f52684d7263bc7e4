/**
 * Layer 14: Configuration & Environment Management
 *
 * Responsibilities:
 * - Separate configuration from code
 * - Enable environment-specific behavior
 * - Configure logging and dispatch policy
 */

export {
  Config,
  ConfigSchema,
  ConfigurationError,
  loadConfig,
  type ConfigOptions,
  type TrellisConfig,
} from './config.ts';
