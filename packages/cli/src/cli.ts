#!/usr/bin/env node
/**
 * @skills-survey/cli
 *
 * Command-line interface for reshaping skills survey exports.
 */

import { createProgram } from './program.js'

createProgram().parse()
