export {
  CONFIG_FILE,
  DEFAULT_CONFIG,
  ProjectConfigFileSchema,
  createDefaultConfig,
  loadProjectConfig,
  mergeConfig,
  parseProjectConfig,
  type LoadedConfig,
  type ProjectConfig,
  type ProjectConfigFile,
  type ProjectConfigOverrides,
  type StandardLibraryConfig,
} from './project-config.js';
