import { existsSync, readFileSync } from 'fs'
import { z } from 'zod'
import { ConfigurationError, getErrorMessage } from '../errors/index.js'
import type { MappingFile, TeamMapping } from '../types/survey.js'
import { createLogger } from '../utils/logger.js'

const log = createLogger('mapping')

/**
 * Top level: team name -> anything
 */
export const MappingFileSchema = z.record(z.string(), z.unknown())

/**
 * One team's entry: category -> subcategories
 */
export const TeamMappingSchema = z.record(z.string(), z.array(z.string()))

/**
 * Decode mapping file contents
 */
export function parseMappingFile(text: string, path: string): MappingFile {
  let data: unknown
  try {
    data = JSON.parse(text)
  } catch (error) {
    throw new ConfigurationError(`Could not read mapping file '${path}'. ${getErrorMessage(error)}`, {
      path,
      cause: error,
    })
  }

  const result = MappingFileSchema.safeParse(data)
  if (!result.success) {
    throw new ConfigurationError(
      `Could not read mapping file '${path}'. Expected an object keyed by team name.`,
      { path, cause: result.error }
    )
  }
  return result.data
}

/**
 * Pick one team's mapping. An absent or empty team is a configuration error;
 * other teams' entries are never inspected.
 */
export function selectTeamMapping(mappings: MappingFile, teamName: string, path: string): TeamMapping {
  const entry = Object.hasOwn(mappings, teamName) ? mappings[teamName] : undefined
  if (entry === undefined) {
    throw new ConfigurationError(`Team '${teamName}' not found in mapping file '${path}'.`, {
      path,
      context: { teamName },
    })
  }

  const result = TeamMappingSchema.safeParse(entry)
  if (!result.success) {
    throw new ConfigurationError(
      `Team '${teamName}' in mapping file '${path}' must map each category to a list of subcategories.`,
      { path, cause: result.error, context: { teamName } }
    )
  }
  if (Object.keys(result.data).length === 0) {
    throw new ConfigurationError(`Team '${teamName}' not found in mapping file '${path}'.`, {
      path,
      context: { teamName },
    })
  }
  return result.data
}

export function loadTeamMapping(path: string, teamName: string): TeamMapping {
  log.info('Loading mapping file...')
  if (!existsSync(path)) {
    throw new ConfigurationError(`Mapping file '${path}' not found. Please check the file path.`, { path })
  }

  const mappings = parseMappingFile(readFileSync(path, 'utf8'), path)
  const team = selectTeamMapping(mappings, teamName, path)
  log.info('Mapping file loaded successfully.')
  log.debug(`Team mapping for '${teamName}'`, { mapping: team })
  return team
}
