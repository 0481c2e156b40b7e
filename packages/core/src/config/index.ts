export {
  DEFAULT_CONFIG_PATH,
  RunConfigSchema,
  describeConfigIssues,
  parseRunConfig,
  loadRunConfig,
  resolveRunInputs,
  type RunConfig,
  type RunInputs,
} from './run-config.js'
export {
  MappingFileSchema,
  TeamMappingSchema,
  parseMappingFile,
  selectTeamMapping,
  loadTeamMapping,
} from './team-mapping.js'
