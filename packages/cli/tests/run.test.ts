/**
 * CLI run command tests
 *
 * The pipeline is mocked; these cover the spinner, the summary and the
 * single failure exit path.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { ConfigurationError, LogLevel, getLogLevel, setLogLevel, type RunOptions, type RunResult } from '@skills-survey/core'

const mocks = vi.hoisted(() => ({
  runSurvey: vi.fn<(options: RunOptions) => RunResult>(),
  spinner: {
    start: vi.fn().mockReturnThis(),
    succeed: vi.fn().mockReturnThis(),
    fail: vi.fn().mockReturnThis(),
    render: vi.fn().mockReturnThis(),
    text: '',
  },
}))

vi.mock('@skills-survey/core', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@skills-survey/core')>()
  return { ...actual, runSurvey: mocks.runSurvey }
})

vi.mock('ora', () => ({
  default: () => mocks.spinner,
}))

import { applyLogLevel, createRunCommand, executeRun, formatRunSummary } from '../src/commands/run.js'
import { formatProgressBar } from '../src/utils/progress.js'

const mockExit = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never)

const RUN: RunResult = {
  teamName: 'Platform',
  processes: ['mad_libs', 'future_skills'],
  rowCount: 2,
  result: { mad_libs: [], current_skills: [], future_skills: [] },
  outputs: [
    { process: 'mad_libs', status: 'written', path: 'mad_libs_Platform.csv', records: 2 },
    { process: 'future_skills', status: 'skipped', reason: 'no free file name' },
  ],
}

describe('run command', () => {
  let consoleLog: ReturnType<typeof vi.spyOn>
  let consoleError: ReturnType<typeof vi.spyOn>

  beforeEach(() => {
    consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {})
    consoleError = vi.spyOn(console, 'error').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    mocks.spinner.text = ''
    delete process.env.LOG_LEVEL
  })

  afterEach(() => {
    setLogLevel(null)
  })

  describe('executeRun', () => {
    it('runs the pipeline with the chosen paths', () => {
      mocks.runSurvey.mockReturnValue(RUN)

      const run = executeRun({ config: 'team/config.json', outputDir: 'reports' })

      expect(run).toBe(RUN)
      expect(mocks.runSurvey).toHaveBeenCalledWith(
        expect.objectContaining({ configPath: 'team/config.json', outputDir: 'reports' })
      )
      expect(mocks.spinner.succeed).toHaveBeenCalledWith(formatProgressBar(1, 1))
      expect(consoleLog).toHaveBeenCalledWith(formatRunSummary(RUN))
      expect(mockExit).not.toHaveBeenCalled()
    })

    it('redraws the spinner for each progress update', () => {
      const drawn: string[] = []
      mocks.spinner.render.mockImplementation(() => {
        drawn.push(mocks.spinner.text)
        return mocks.spinner
      })
      mocks.runSurvey.mockImplementation((options) => {
        options.onProgress?.(1, 4)
        options.onProgress?.(2, 4)
        return RUN
      })

      executeRun({ config: 'config.json', outputDir: '.' })

      expect(drawn).toEqual([formatProgressBar(1, 4), formatProgressBar(2, 4)])
    })

    it('logs a critical message and exits with status 1 on failure', () => {
      mocks.runSurvey.mockImplementation(() => {
        throw new ConfigurationError("Team 'Data' not found in mapping file 'mapping.json'.")
      })

      executeRun({ config: 'config.json', outputDir: '.' })

      expect(mocks.spinner.fail).toHaveBeenCalledWith('Survey processing failed')
      expect(consoleError).toHaveBeenCalledWith(
        "CRITICAL: [skills-survey:cli] Team 'Data' not found in mapping file 'mapping.json'."
      )
      expect(mockExit).toHaveBeenCalledWith(1)
    })
  })

  describe('applyLogLevel', () => {
    it('--verbose selects DEBUG', () => {
      applyLogLevel({ verbose: true, logLevel: 'error' })

      expect(getLogLevel()).toBe(LogLevel.DEBUG)
    })

    it('accepts a level name', () => {
      applyLogLevel({ logLevel: 'warn' })

      expect(getLogLevel()).toBe(LogLevel.WARN)
    })

    it('keeps the current level for an unknown name', () => {
      applyLogLevel({ logLevel: 'loud' })

      expect(getLogLevel()).toBe(LogLevel.INFO)
    })
  })

  describe('formatRunSummary', () => {
    it('lists every output', () => {
      const summary = formatRunSummary(RUN)

      expect(summary).toContain('=== Skills Survey: Platform ===')
      expect(summary).toContain('Mad Libs: mad_libs_Platform.csv')
      expect(summary).toContain('(2 rows)')
      expect(summary).toContain('skipped, no free file name')
    })
  })

  describe('createRunCommand', () => {
    it('defaults to ./config.json and the working directory', () => {
      const command = createRunCommand()

      expect(command.name()).toBe('run')
      expect(command.opts()).toEqual({ config: './config.json', outputDir: '.' })
    })
  })
})
