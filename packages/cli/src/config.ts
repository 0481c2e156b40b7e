/**
 * CLI Configuration
 *
 * Shared defaults for the skills-survey CLI.
 */

import { DEFAULT_CONFIG_PATH } from '@skills-survey/core'

/**
 * Default run configuration: ./config.json in the working directory
 */
export const DEFAULT_CONFIG = DEFAULT_CONFIG_PATH

/**
 * Output files are written beside the working directory unless told otherwise
 */
export const DEFAULT_OUTPUT_DIR = '.'

/**
 * Progress bar width when the terminal size is unknown
 */
export const DEFAULT_BAR_WIDTH = 80
