/**
 * skills-survey command tree
 */

import { Command } from 'commander'
import { VERSION } from '@skills-survey/core'
import { createHeadersCommand, createRunCommand } from './commands/index.js'

export function createProgram(): Command {
  const program = new Command()

  program
    .name('skills-survey')
    .description('Reshape a skills survey export into reporting datasets')
    .version(VERSION)

  program.addCommand(createRunCommand(), { isDefault: true })
  program.addCommand(createHeadersCommand())

  return program
}
