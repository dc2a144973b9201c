#!/usr/bin/env node
import fs from 'fs'
import json5 from 'json5'

import { expandShortFlags, formatHelp, loadConfig, resolveSettings } from './config'
import { ExecutionError, exitCodeFor } from './errors'
import { logger, resolvePackagePath } from './utils'
import { calculateVmafScore } from './vmaf'

const log = logger('vqscore')

function showHelpOrVersion(args: string[]): void {
  if (args.includes('--full-help')) {
    console.log(formatHelp(true))
    process.exit(0)
  } else if (args.includes('--help')) {
    console.log(formatHelp(false))
    process.exit(0)
  } else if (args.includes('--version')) {
    const { version } = json5.parse<{ version: string }>(fs.readFileSync(resolvePackagePath('package.json')).toString())
    console.log(version)
    process.exit(0)
  }
}

/**
 * Main function
 */
async function main(): Promise<void> {
  const args = expandShortFlags(process.argv.slice(2))
  showHelpOrVersion(args)

  const config = loadConfig(process.env.VQSCORE_CONFIG, undefined, { args })
  const settings = resolveSettings(config)
  const results = await calculateVmafScore(settings)
  log.debug(`Done: ${results.map(r => r.outputPath).join(', ')}`)
}

if (require.main === module) {
  main()
    .then(() => process.exit(0))
    .catch(err => {
      const error = err instanceof Error ? err : new Error(String(err))
      console.error(`${error.name}: ${error.message}`)
      if (error instanceof ExecutionError && error.stderr) {
        console.error(error.stderr.trim())
      }
      log.debug(error.stack)
      process.exit(exitCodeFor(error))
    })
}
