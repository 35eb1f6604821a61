/**
 * Config Module
 *
 * Provides:
 * - YAML and JSON config parsing
 * - Zod-validated schemas with defaults for every key
 * - Conversion into the camelCase render policy
 * - Chart library profile (vega-embed by default)
 */

export {
  ConfigParser,
  createConfigParser,
  loadConfig,
  loadRenderPolicy,
  DEFAULT_CONFIG,
  DEFAULT_POLICY,
  CONFIG_FILENAMES,
  ChartshotConfigSchema,
  type ChartshotConfig,
  type ChartshotConfigInput,
  type ChartLibraryProfile,
  type ServerPolicy,
  type BrowserPolicy,
  type NavigationPolicy,
  type ReadinessPolicy,
  type AssetPolicy,
  type RenderPolicy,
} from './parser.js';
