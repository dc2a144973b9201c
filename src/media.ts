import path from 'path'
import { z } from 'zod'

import { ConfigurationError, ExecutionError, ParseError } from './errors'
import type { VideoInfo } from './types'
import { type CommandRunner, logger, runCommand } from './utils'

const log = logger('vqscore:media')

export type ToolPaths = {
  ffmpeg: string
  ffprobe: string
}

const ffprobeOutputSchema = z.object({
  streams: z.array(
    z.object({
      width: z.number().int().positive(),
      height: z.number().int().positive(),
    }),
  ),
  format: z.object({
    duration: z.string(),
  }),
})

/**
 * Parses the `ffprobe -of json` output of the first video stream.
 * @param stdout the ffprobe output
 * @param fpath the probed file, used in error messages
 */
export function parseProbeOutput(stdout: string, fpath: string): VideoInfo {
  let data: unknown
  try {
    data = JSON.parse(stdout)
  } catch (err) {
    throw new ParseError(`ffprobe output for ${fpath} is not valid JSON: ${(err as Error).message}`)
  }
  const result = ffprobeOutputSchema.safeParse(data)
  if (!result.success) {
    throw new ParseError(`unexpected ffprobe output for ${fpath}: ${result.error.issues[0]?.message}`)
  }
  const { streams, format } = result.data
  if (!streams.length) {
    throw new ConfigurationError(`${fpath} has no video stream`)
  }
  const duration = parseFloat(format.duration)
  if (!Number.isFinite(duration) || duration <= 0) {
    throw new ConfigurationError(`${fpath} has an invalid duration: ${format.duration}`)
  }
  return { width: streams[0].width, height: streams[0].height, duration }
}

/**
 * Reads the width, height and duration of the first video stream.
 */
export async function probeVideo(fpath: string, ffprobe = 'ffprobe', run: CommandRunner = runCommand): Promise<VideoInfo> {
  let stdout: string
  try {
    ;({ stdout } = await run(ffprobe, [
      '-v',
      'error',
      '-select_streams',
      'v:0',
      '-show_entries',
      'stream=width,height:format=duration',
      '-of',
      'json',
      fpath,
    ]))
  } catch (err) {
    if (err instanceof ExecutionError) {
      throw new ConfigurationError(`unable to read video ${fpath}: ${err.stderr.trim() || err.message}`)
    }
    throw err
  }
  const info = parseProbeOutput(stdout, fpath)
  log.debug(`probeVideo ${path.basename(fpath)} ${info.width}x${info.height} ${info.duration}s`)
  return info
}

/**
 * Checks that ffmpeg, ffprobe and the ffmpeg libvmaf filter are available.
 */
export async function verifyTools(tools: ToolPaths, run: CommandRunner = runCommand): Promise<void> {
  const checks: { name: string; file: string; args: string[]; expect?: RegExp }[] = [
    { name: 'FFmpeg', file: tools.ffmpeg, args: ['-version'] },
    { name: 'FFprobe', file: tools.ffprobe, args: ['-version'] },
    { name: 'VMAF', file: tools.ffmpeg, args: ['-hide_banner', '-filters'], expect: /\blibvmaf\b/ },
  ]
  for (const { name, file, args, expect } of checks) {
    log.info(`Verifying "${name}" availability...`)
    let stdout: string
    try {
      ;({ stdout } = await run(file, args))
    } catch (err) {
      if (err instanceof ExecutionError) {
        throw new ConfigurationError(`"${name}" not found (${file}): ${err.message}`)
      }
      throw err
    }
    if (expect && !expect.test(stdout)) {
      throw new ConfigurationError(`"${name}" not found: ${file} has no libvmaf filter`)
    }
  }
}
