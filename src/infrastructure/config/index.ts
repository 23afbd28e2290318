export {
  loadMiningConfig,
  parseSectionedYaml,
  miningConfigSchema,
  DEFAULT_MINING_CONFIG,
} from './mining-config.js';
export type { MiningConfig } from './mining-config.js';
export { default as miningConfigPlugin } from './config-plugin.js';
