#!/usr/bin/env node
import { ConfigError } from '../node/shared/errors'
import { createProgram } from './program'

/**
 * Runs the CLI on `argv` (node-style, script path included). Any failure
 * prints to stderr and exits with status 1.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv)
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error loading config: ${error.message}`)
    } else {
      console.error('Error building status report:', error)
    }
    process.exit(1)
  }
}

if (require.main === module) {
  void main()
}
