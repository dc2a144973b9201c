import Log from 'debug-level'
import { execFile } from 'child_process'
import fs from 'fs'
import path from 'path'

import { ExecutionError } from './errors'

type Logger = {
  error: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  info: (...args: unknown[]) => void
  debug: (...args: unknown[]) => void
  log: (...args: unknown[]) => void
}

export function logger(name: string): Logger {
  return new Log(name)
}

const log = logger('vqscore:utils')

/**
 * Resolves the absolute path from the package installation directory.
 * @param relativePath The relative path.
 * @returns The absolute path.
 */
export function resolvePackagePath(relativePath: string): string {
  for (const d of ['..', '../..']) {
    const p = path.join(__dirname, d, relativePath)
    if (fs.existsSync(p)) {
      return p
    }
  }
  throw new Error(`resolvePackagePath: ${relativePath} not found`)
}

export type CommandOutput = { stdout: string; stderr: string }

/** Runs an executable with the given arguments, resolving its captured output. */
export type CommandRunner = (file: string, args: string[]) => Promise<CommandOutput>

const MAX_BUFFER = 64 * 1024 * 1024

/**
 * Runs the command asynchronously, without a shell.
 * It rejects with an {@link ExecutionError} holding the exit status and the
 * captured stderr when the process can't be started or exits abnormally.
 */
export const runCommand: CommandRunner = (file, args) => {
  log.debug(`runCommand: ${formatCommand(file, args)}`)
  return new Promise((resolve, reject) => {
    execFile(file, args, { maxBuffer: MAX_BUFFER }, (error, stdout, stderr) => {
      if (error) {
        const status = typeof error.code === 'number' ? error.code : null
        reject(
          new ExecutionError(
            `${path.basename(file)} failed (${status !== null ? `exit status ${status}` : error.code || error.signal || 'spawn error'})`,
            status,
            stderr || error.message,
          ),
        )
        return
      }
      log.debug(`runCommand: ${file} done`, { stdout: stdout.length, stderr: stderr.length })
      resolve({ stdout, stderr })
    })
  })
}

const SafeShellWord = /^[\w@%+=:,./-]+$/

/** Quotes a single word for a POSIX shell. */
export function shellQuote(word: string): string {
  if (!word) return `''`
  if (SafeShellWord.test(word)) return word
  return `'${word.replace(/'/g, `'"'"'`)}'`
}

/** Formats the command line as it could be pasted into a shell. */
export function formatCommand(file: string, args: string[]): string {
  return [file, ...args].map(shellQuote).join(' ')
}

/**
 * Format number to the specified precision.
 * @param value value to format
 * @param precision precision
 */
export function toPrecision(value: number, precision = 3): string {
  return (Math.round(value * 10 ** precision) / 10 ** precision).toFixed(precision)
}

/** Splits a comma separated config value, dropping the empty items. */
export function splitList(value: string): string[] {
  return value
    .split(',')
    .map(s => s.trim())
    .filter(s => s.length > 0)
}
