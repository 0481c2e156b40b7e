/**
 * CLI Run Command
 *
 * Reads config.json, reshapes the survey export and writes one CSV per
 * selected process.
 */

import { Command } from 'commander'
import chalk from 'chalk'
import ora from 'ora'
import {
  PROCESS_LABELS,
  createLogger,
  parseLogLevel,
  runSurvey,
  setLogLevel,
  LogLevel,
  type OutputOutcome,
  type RunResult,
} from '@skills-survey/core'
import { DEFAULT_CONFIG, DEFAULT_OUTPUT_DIR } from '../config.js'
import { formatProgressBar } from '../utils/progress.js'
import { logFailure } from '../utils/failure.js'

const log = createLogger('cli')

export interface RunCommandOptions {
  config: string
  outputDir: string
  logLevel?: string
  verbose?: boolean
}

/**
 * Apply --verbose / --log-level. Unknown level names are ignored with a warning.
 */
export function applyLogLevel(options: Pick<RunCommandOptions, 'logLevel' | 'verbose'>): void {
  if (options.verbose) {
    setLogLevel(LogLevel.DEBUG)
    return
  }
  if (options.logLevel === undefined) {
    return
  }
  const level = parseLogLevel(options.logLevel)
  if (level === undefined) {
    log.warn(`Unknown log level "${options.logLevel}", keeping ${LogLevel[LogLevel.INFO]}`)
    return
  }
  setLogLevel(level)
}

function formatOutcome(outcome: OutputOutcome): string {
  const label = PROCESS_LABELS[outcome.process]
  if (outcome.status === 'written') {
    return `  ${chalk.green('✓')} ${label}: ${outcome.path} ${chalk.dim(`(${outcome.records} rows)`)}`
  }
  return `  ${chalk.yellow('!')} ${label}: ${chalk.yellow(`skipped, ${outcome.reason}`)}`
}

/**
 * Summary printed after a successful run
 */
export function formatRunSummary(run: RunResult): string {
  const lines: string[] = []
  lines.push('')
  lines.push(chalk.bold.blue(`=== Skills Survey: ${run.teamName} ===`))
  lines.push(`${chalk.bold('Respondents:')} ${run.rowCount}`)
  lines.push('')
  for (const outcome of run.outputs) {
    lines.push(formatOutcome(outcome))
  }
  lines.push('')
  return lines.join('\n')
}

/**
 * Run the survey pipeline. Any error is logged at CRITICAL level and ends
 * the process with status 1.
 */
export function executeRun(options: RunCommandOptions): RunResult {
  applyLogLevel(options)
  const spinner = ora('Processing survey...').start()

  try {
    const run = runSurvey({
      configPath: options.config,
      outputDir: options.outputDir,
      onProgress: (done, total) => {
        spinner.text = formatProgressBar(done, total)
        // runSurvey is synchronous: no spinner tick fires until it returns
        spinner.render()
      },
    })
    spinner.succeed(formatProgressBar(1, 1))
    console.log(formatRunSummary(run))
    return run
  } catch (error) {
    spinner.fail('Survey processing failed')
    logFailure(error)
    process.exit(1)
  }
}

/**
 * Create run command
 */
export function createRunCommand(): Command {
  return new Command('run')
    .description('Reshape a skills survey export into mad-libs, current and future skills reports')
    .option('-c, --config <path>', 'Path to the run configuration', DEFAULT_CONFIG)
    .option('-o, --output-dir <dir>', 'Directory for the output CSV files', DEFAULT_OUTPUT_DIR)
    .option('-l, --log-level <level>', 'DEBUG, INFO, WARN, ERROR or CRITICAL')
    .option('-v, --verbose', 'Same as --log-level DEBUG')
    .action((options: RunCommandOptions) => {
      executeRun(options)
    })
}

export default createRunCommand
