/**
 * Run configuration
 *
 * config.json names the survey export, the mapping file and the team, and
 * selects which reshaping processes to run:
 *
 * ```json
 * {
 *   "input": { "csv_file": "survey.csv", "mapping_file": "mapping.json", "team_name": "Platform" },
 *   "processes": ["mad_libs", "current_skills", "future_skills"]
 * }
 * ```
 */

import { existsSync, readFileSync } from 'fs'
import { z, type ZodIssue } from 'zod'
import { ConfigurationError, getErrorMessage } from '../errors/index.js'
import { PROCESS_NAMES, type ProcessName, type TeamMapping } from '../types/survey.js'
import { createLogger } from '../utils/logger.js'
import { loadTeamMapping } from './team-mapping.js'

const log = createLogger('config')

export const DEFAULT_CONFIG_PATH = './config.json'

export const RunConfigSchema = z.object({
  input: z.object({
    csv_file: z.string().min(1),
    mapping_file: z.string().min(1),
    team_name: z.string().min(1),
  }),
  processes: z
    .array(z.enum(PROCESS_NAMES))
    .default([...PROCESS_NAMES])
    .transform((names) => [...new Set(names)]),
})

export type RunConfig = z.infer<typeof RunConfigSchema>

/**
 * Everything a run needs once the configuration has been checked
 */
export interface RunInputs {
  csvFile: string
  teamName: string
  processes: ProcessName[]
  /** Only loaded when current_skills or future_skills is selected */
  mapping: TeamMapping | null
}

function issuePath(issue: ZodIssue): string {
  return issue.path.join(': ')
}

function isMissing(issue: ZodIssue): boolean {
  return issue.code === 'invalid_type' && issue.received === 'undefined'
}

/**
 * Turn schema issues into one message listing every missing element
 */
export function describeConfigIssues(issues: readonly ZodIssue[]): string {
  const missing = issues.filter(isMissing).map(issuePath)
  const invalid = issues.filter((issue) => !isMissing(issue)).map((issue) => `${issuePath(issue)} (${issue.message})`)

  const parts: string[] = []
  if (missing.length > 0) {
    parts.push(`Missing required elements in the configuration file: ${missing.join(', ')}`)
  }
  if (invalid.length > 0) {
    parts.push(`Invalid elements in the configuration file: ${invalid.join(', ')}`)
  }
  return parts.join('. ')
}

/**
 * Validate already-decoded configuration data
 */
export function parseRunConfig(data: unknown, path = DEFAULT_CONFIG_PATH): RunConfig {
  const result = RunConfigSchema.safeParse(data)
  if (!result.success) {
    throw new ConfigurationError(describeConfigIssues(result.error.issues), { path })
  }
  return result.data
}

/**
 * Read and validate config.json
 */
export function loadRunConfig(path: string = DEFAULT_CONFIG_PATH): RunConfig {
  log.info('Parsing configuration file...')

  if (!existsSync(path)) {
    throw new ConfigurationError(`File not found at '${path}'. Please check the file path.`, { path })
  }

  let data: unknown
  try {
    data = JSON.parse(readFileSync(path, 'utf8'))
  } catch (error) {
    throw new ConfigurationError(`Could not decode JSON from '${path}'. ${getErrorMessage(error)}`, {
      path,
      cause: error,
    })
  }

  const config = parseRunConfig(data, path)
  log.info('Configuration file loaded successfully.')
  log.debug('Configuration', { config })
  return config
}

/**
 * Check the survey file exists and load the team mapping when a skills
 * process needs it
 */
export function resolveRunInputs(config: RunConfig): RunInputs {
  const { csv_file: csvFile, mapping_file: mappingFile, team_name: teamName } = config.input
  log.debug('Processes to run', { processes: config.processes })

  if (!existsSync(csvFile)) {
    throw new ConfigurationError(`Input file '${csvFile}' not found. Please check the file path.`, {
      path: csvFile,
    })
  }

  const needsMapping = config.processes.some(
    (name) => name === 'current_skills' || name === 'future_skills'
  )
  const mapping = needsMapping ? loadTeamMapping(mappingFile, teamName) : null

  return { csvFile, teamName, processes: config.processes, mapping }
}
