/**
 * CLI Headers Command
 *
 * Reports which mapping-declared survey columns were recognized, without
 * writing any output.
 */

import { Command } from 'commander'
import chalk from 'chalk'
import { inspectSurveyHeaders, type HeaderReport } from '@skills-survey/core'
import { DEFAULT_CONFIG } from '../config.js'
import { logFailure } from '../utils/failure.js'
import { sanitizeError } from '../utils/sanitize.js'

function countRecognized(report: HeaderReport): number {
  if (report.context === null) {
    return 0
  }
  let count = report.context.identity.size
  for (const subcategories of report.context.skills.values()) {
    for (const columns of subcategories.values()) {
      count += Number(columns.SELF !== null) + Number(columns.TEAM !== null)
    }
  }
  for (const columns of report.context.intents.values()) {
    count += Number(columns.USE !== null) + Number(columns.LEARN !== null)
  }
  return count
}

/**
 * Format header report for terminal display
 */
export function formatHeaderReport(report: HeaderReport): string {
  const lines: string[] = []

  lines.push('')
  lines.push(chalk.bold.blue(`=== Survey Columns: ${report.teamName} ===`))
  lines.push(`${chalk.bold('Columns:')} ${report.columnCount} | ${chalk.bold('Recognized:')} ${countRecognized(report)}`)
  lines.push('')

  if (report.missing.length > 0) {
    lines.push(chalk.bold(`Not found in survey (${report.missing.length}):`))
    for (const label of report.missing) {
      lines.push(`  ${chalk.yellow('•')} ${label}`)
    }
    lines.push('')
  }

  const unmapped = report.context?.unmapped ?? []
  if (unmapped.length > 0) {
    lines.push(chalk.bold(`Not in team mapping (${unmapped.length}):`))
    for (const header of unmapped) {
      lines.push(`  ${chalk.dim('•')} ${header}`)
    }
    lines.push('')
  }

  if (report.madLibsMissing.length > 0) {
    lines.push(chalk.bold('Mad libs questions not found:'))
    for (const question of report.madLibsMissing) {
      lines.push(`  ${chalk.yellow('•')} ${question}`)
    }
    lines.push('')
  }

  if (report.missing.length === 0 && unmapped.length === 0 && report.madLibsMissing.length === 0) {
    lines.push(chalk.green('All expected columns found'))
    lines.push('')
  }

  return lines.join('\n')
}

/**
 * Format header report as JSON
 */
export function formatHeaderReportJson(report: HeaderReport): string {
  return JSON.stringify(
    {
      team: report.teamName,
      columns: report.columnCount,
      recognized: countRecognized(report),
      missing: report.missing,
      unmapped: report.context?.unmapped ?? [],
      mad_libs_missing: report.madLibsMissing,
    },
    null,
    2
  )
}

/**
 * Create headers command
 */
export function createHeadersCommand(): Command {
  return new Command('headers')
    .description('Check which survey columns match the team mapping')
    .option('-c, --config <path>', 'Path to the run configuration', DEFAULT_CONFIG)
    .option('-j, --json', 'Output results as JSON')
    .action((options: { config: string; json?: boolean }) => {
      try {
        const report = inspectSurveyHeaders(options.config)
        console.log(options.json ? formatHeaderReportJson(report) : formatHeaderReport(report))
      } catch (error) {
        if (options.json) {
          console.error(JSON.stringify({ error: sanitizeError(error) }))
        } else {
          logFailure(error)
        }
        process.exit(1)
      }
    })
}

export default createHeadersCommand
