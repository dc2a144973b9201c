import fs from 'fs'
import os from 'os'
import path from 'path'

import type { Settings } from './config'
import { ConfigurationError, ExecutionError } from './errors'
import { buildFfmpegArgs } from './filter'
import { probeVideo, verifyTools } from './media'
import { createLogParser } from './parser'
import { formatSummary, summarize, writeCsv } from './stats'
import type { AnalysisOptions, AnalysisRequest, FrameScore, LogFormat, SummaryReport } from './types'
import { type CommandRunner, formatCommand, logger, runCommand } from './utils'
import { checkOptions, validateRequest } from './validate'

const log = logger('vqscore:vmaf')

export type VmafRun = {
  stdout: string
  stderr: string
  /** The libvmaf log contents. */
  log: string
}

/**
 * Runs the ffmpeg libvmaf comparison once, capturing the process output and
 * the libvmaf log.
 */
export async function runVmaf(
  request: AnalysisRequest,
  ffmpeg = 'ffmpeg',
  logFormat: LogFormat = 'json',
  run: CommandRunner = runCommand,
): Promise<VmafRun> {
  const tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'vqscore-'))
  const logPath = path.join(tmpDir, `vmaf.${logFormat}`)
  try {
    const args = buildFfmpegArgs(request, logPath, logFormat)
    log.debug('runVmaf', formatCommand(ffmpeg, args))
    const { stdout, stderr } = await run(ffmpeg, args)
    let vmafLog: string
    try {
      vmafLog = await fs.promises.readFile(logPath, 'utf-8')
    } catch (err) {
      throw new ExecutionError(`libvmaf log not written: ${(err as Error).message}`, 0, stderr)
    }
    return { stdout, stderr, log: vmafLog }
  } finally {
    await fs.promises.rm(tmpDir, { recursive: true, force: true })
  }
}

/** Returns the CSV output path of a distorted video. */
export function outputPath(distortedPath: string, outputDir: string): string {
  return path.join(outputDir, `${path.basename(distortedPath, path.extname(distortedPath))}-quality.csv`)
}

export type QualityResult = {
  distortedPath: string
  outputPath: string
  frames: FrameScore[]
  report: SummaryReport
}

type AnalysisSettings = Pick<Settings, 'tools' | 'frame' | 'logFormat' | 'outputDir' | 'dryRun'>

/**
 * The libvmaf log path shown by a dry run; {@link runVmaf} creates the
 * directory, replacing `XXXXXX` with a unique suffix.
 */
export function logPathPlaceholder(logFormat: LogFormat): string {
  return path.join(os.tmpdir(), 'vqscore-XXXXXX', `vmaf.${logFormat}`)
}

/**
 * Runs and parses the comparison of a validated request, writing its CSV
 * file and printing the summary.
 * @returns the result, or undefined with a dry run
 */
export async function runAnalysis(
  request: AnalysisRequest,
  settings: AnalysisSettings,
  run: CommandRunner = runCommand,
): Promise<QualityResult | undefined> {
  const { tools, logFormat, outputDir, dryRun } = settings
  const csvPath = outputPath(request.distortedPath, outputDir)

  if (dryRun) {
    const args = buildFfmpegArgs(request, logPathPlaceholder(logFormat), logFormat)
    console.log(`\n${formatCommand(tools.ffmpeg, args)}\n`)
    return
  }

  log.info(`Calculating ${request.metrics.join(', ')} for ${request.distortedPath}`)
  const { log: vmafLog } = await runVmaf(request, tools.ffmpeg, logFormat, run)
  const frames = createLogParser(logFormat).parse(vmafLog, request.metrics)
  const report = summarize(frames, request.metrics)

  await writeCsv(csvPath, frames, request.metrics)
  console.log(formatSummary(path.basename(request.distortedPath), report))
  return { distortedPath: request.distortedPath, outputPath: csvPath, frames, report }
}

/**
 * Validates, runs and parses the comparison of a single distorted video.
 * @returns the result, or undefined with a dry run
 */
export async function analyze(
  options: AnalysisOptions,
  settings: AnalysisSettings,
  run: CommandRunner = runCommand,
): Promise<QualityResult | undefined> {
  const request = await validateRequest(options, settings.frame, fpath => probeVideo(fpath, settings.tools.ffprobe, run))
  return runAnalysis(request, settings, run)
}

/**
 * Calculates the quality scores of every configured distorted video.
 * Every input is validated before the first comparison starts; the first
 * failure stops the run.
 */
export async function calculateVmafScore(settings: Settings, run: CommandRunner = runCommand): Promise<QualityResult[]> {
  const { reference, distorted, options, frame, tools, outputDir, overwrite, dryRun } = settings
  log.debug(`calculateVmafScore reference=${reference} distorted=${distorted}`)

  const analysisOptions = distorted.map(distortedPath => ({ ...options, referencePath: reference, distortedPath }))
  for (const o of analysisOptions) {
    await checkOptions(o, frame)
  }

  const outputs = new Set<string>()
  for (const distortedPath of distorted) {
    const fpath = outputPath(distortedPath, outputDir)
    if (outputs.has(fpath)) {
      throw new ConfigurationError(`Output file name conflict: ${fpath}`)
    }
    outputs.add(fpath)
    if (!dryRun && !overwrite && fs.existsSync(fpath)) {
      throw new ConfigurationError(`Output file already exists: ${fpath}`)
    }
  }

  if (settings.verifyTools) {
    await verifyTools(tools, run)
  }

  const requests: AnalysisRequest[] = []
  for (const o of analysisOptions) {
    requests.push(await validateRequest(o, frame, fpath => probeVideo(fpath, tools.ffprobe, run)))
  }

  const ret: QualityResult[] = []
  for (const request of requests) {
    const result = await runAnalysis(request, settings, run)
    if (result) ret.push(result)
  }
  return ret
}
