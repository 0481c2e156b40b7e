/**
 * Output writer tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, readFileSync, writeFileSync } from 'fs'
import { join } from 'path'
import {
  MAX_OUTPUT_VERSIONS,
  outputBaseName,
  resolveOutputPath,
  writeProcessOutputs,
  writeRecords,
} from '../src/io/output-writer.js'
import { CURRENT_SKILL_COLUMNS, type SurveyResult } from '../src/types/survey.js'
import { getLogAggregator, LogLevel } from '../src/utils/logger.js'
import { createTempDir } from './fixtures/temp-dir.js'

const RESULT: SurveyResult = {
  mad_libs: [{ FullName: 'Ada Lovelace', 'Mad Libs': 'Hi, my name is Ada!' }],
  current_skills: [
    {
      Name: 'Ada Lovelace',
      Classification: 'Senior',
      Team: 'Platform',
      Category: 'Cloud',
      SubCategory: 'AWS',
      'Skill Level Value': 3,
      'Skill Level Desc': 'Advanced',
      'Team Need Value': 'N/A',
      'Team Need Desc': 'N/A',
    },
  ],
  future_skills: [],
}

describe('output writer', () => {
  let dir: string
  let cleanup: () => void

  beforeEach(() => {
    ;({ dir, cleanup } = createTempDir())
    getLogAggregator().clear()
  })

  afterEach(() => {
    cleanup()
  })

  describe('resolveOutputPath', () => {
    it('uses the base name when it is free', () => {
      expect(resolveOutputPath(dir, 'current_skills_Platform')).toBe(join(dir, 'current_skills_Platform.csv'))
    })

    it('moves to the next version when earlier names exist', () => {
      writeFileSync(join(dir, 'current_skills_Platform.csv'), '')
      writeFileSync(join(dir, 'current_skills_Platform_1.csv'), '')

      expect(resolveOutputPath(dir, 'current_skills_Platform')).toBe(join(dir, 'current_skills_Platform_2.csv'))
    })

    it('gives up once every version is taken', () => {
      writeFileSync(join(dir, 'mad_libs_Ops.csv'), '')
      for (let version = 1; version < MAX_OUTPUT_VERSIONS; version++) {
        writeFileSync(join(dir, `mad_libs_Ops_${version}.csv`), '')
      }

      expect(resolveOutputPath(dir, 'mad_libs_Ops')).toBeNull()
    })
  })

  describe('writeRecords', () => {
    it('writes the header in column order followed by the records', () => {
      const path = join(dir, 'out.csv')
      writeRecords(path, CURRENT_SKILL_COLUMNS, RESULT.current_skills)

      expect(readFileSync(path, 'utf8')).toBe(
        'Name,Classification,Team,Category,SubCategory,Skill Level Value,Skill Level Desc,Team Need Value,Team Need Desc\n' +
          'Ada Lovelace,Senior,Platform,Cloud,AWS,3,Advanced,N/A,N/A\n'
      )
    })

    it('never overwrites an existing file', () => {
      const path = join(dir, 'out.csv')
      writeFileSync(path, 'keep')

      expect(() => writeRecords(path, CURRENT_SKILL_COLUMNS, [])).toThrow()
      expect(readFileSync(path, 'utf8')).toBe('keep')
    })
  })

  describe('writeProcessOutputs', () => {
    it('writes one file per selected process', () => {
      const outcomes = writeProcessOutputs(RESULT, ['mad_libs', 'current_skills'], 'Platform', dir)

      expect(outcomes).toEqual([
        { process: 'mad_libs', status: 'written', path: join(dir, 'mad_libs_Platform.csv'), records: 1 },
        {
          process: 'current_skills',
          status: 'written',
          path: join(dir, 'current_skills_Platform.csv'),
          records: 1,
        },
      ])
      expect(readFileSync(join(dir, 'mad_libs_Platform.csv'), 'utf8')).toBe(
        'FullName,Mad Libs\nAda Lovelace,"Hi, my name is Ada!"\n'
      )
      expect(existsSync(join(dir, 'future_skills_Platform.csv'))).toBe(false)
    })

    it('skips an output with no free name and still writes the others', () => {
      writeFileSync(join(dir, `${outputBaseName('mad_libs', 'Platform')}.csv`), '')
      for (let version = 1; version < MAX_OUTPUT_VERSIONS; version++) {
        writeFileSync(join(dir, `mad_libs_Platform_${version}.csv`), '')
      }

      const outcomes = writeProcessOutputs(RESULT, ['mad_libs', 'current_skills'], 'Platform', dir)

      expect(outcomes[0]).toEqual({ process: 'mad_libs', status: 'skipped', reason: 'no free file name' })
      expect(outcomes[1]?.status).toBe('written')

      const warnings = getLogAggregator()
        .getLogs()
        .filter((entry) => entry.level === LogLevel.WARN)
        .map((entry) => entry.message)
      expect(warnings).toEqual([
        'Unable to create output file for mad_libs',
        'Please ensure there are less than 100 versions for this file.',
      ])
    })
  })
})
