import fs from 'fs'

import { ConfigurationError } from './errors'
import type { AnalysisOptions, AnalysisRequest, CropFormat, CropRect, FrameSize, VideoInfo } from './types'
import { logger } from './utils'

const log = logger('vqscore:validate')

const CropRegExp = /^(\d+):(\d+):(\d+):(\d+)$/

/** Seconds of rounding tolerated in position + duration. */
const TIME_TOLERANCE = 1e-6

/**
 * Parses the crop value into a rectangle inside the frame.
 *
 * With the `handbrake` format the four values are `TOP:BOTTOM:LEFT:RIGHT`
 * margins; with `auto` they are read as margins only when every margin is
 * at most a quarter of the frame side it applies to.
 */
export function parseCrop(value: string, frame: FrameSize, format: CropFormat = 'ffmpeg'): CropRect {
  const match = value.trim().match(CropRegExp)
  if (!match) {
    throw new ConfigurationError(`Invalid crop: ${value}`)
  }
  const [a, b, c, d] = match.slice(1).map(v => parseInt(v, 10))
  const margins =
    format === 'handbrake' ||
    (format === 'auto' && a <= frame.height / 4 && b <= frame.height / 4 && c <= frame.width / 4 && d <= frame.width / 4)

  let crop: CropRect
  if (margins) {
    log.debug('Interpreting crop geometry as TOP:BOTTOM:LEFT:RIGHT values...')
    crop = { width: frame.width - (c + d), height: frame.height - (a + b), x: c, y: a }
  } else {
    crop = { width: a, height: b, x: c, y: d }
  }

  if (crop.width <= 0 || crop.height <= 0) {
    throw new ConfigurationError(`Invalid crop: ${value} results in an empty ${crop.width}x${crop.height} area`)
  }
  if (crop.x + crop.width > frame.width || crop.y + crop.height > frame.height) {
    throw new ConfigurationError(
      `Invalid crop: ${crop.width}:${crop.height}:${crop.x}:${crop.y} exceeds the ${frame.width}x${frame.height} frame`,
    )
  }
  return crop
}

/** Checks the position and duration values alone. */
export function checkTimingValues(position?: number, duration?: number): void {
  if (position !== undefined && (!Number.isFinite(position) || position < 0)) {
    throw new ConfigurationError(`Position (${position}s) invalid: it must be a non-negative number`)
  }
  if (duration !== undefined && (!Number.isFinite(duration) || duration <= 0)) {
    throw new ConfigurationError(`Duration (${duration}s) invalid: it must be greater than 0`)
  }
}

/**
 * Checks that the reference clip selected by position and duration lies
 * within the reference video.
 * @param length the reference duration in seconds
 */
export function checkTiming(position: number | undefined, duration: number | undefined, length: number): void {
  checkTimingValues(position, duration)
  const start = position ?? 0
  if (duration !== undefined) {
    if (start + duration - length > TIME_TOLERANCE) {
      throw new ConfigurationError(
        `Position (${start}s) and Duration (${duration}s) invalid: total time exceeds length of reference video (${length}s)`,
      )
    }
  } else if (start >= length) {
    throw new ConfigurationError(`Position (${start}s) invalid: it exceeds length of reference video (${length}s)`)
  }
}

function checkResolution(fpath: string, info: VideoInfo, frame: FrameSize): void {
  if (info.width !== frame.width || info.height !== frame.height) {
    throw new ConfigurationError(
      `${fpath} resolution ${info.width}x${info.height} is not supported, expected ${frame.width}x${frame.height}`,
    )
  }
}

async function checkReadable(fpath: string, kind: string): Promise<void> {
  try {
    await fs.promises.access(fpath, fs.constants.R_OK)
  } catch (err) {
    throw new ConfigurationError(`${kind} video file ${fpath} does not exist or is not readable`)
  }
  const stat = await fs.promises.stat(fpath)
  if (!stat.isFile()) {
    throw new ConfigurationError(`${kind} video file ${fpath} is not a file`)
  }
}

/**
 * Checks everything that needs no external tool: files, position and
 * duration values, and the crop bounds.
 * @returns the crop rectangle, if any
 */
export async function checkOptions(options: AnalysisOptions, frame: FrameSize): Promise<CropRect | undefined> {
  const { referencePath, distortedPath, crop, cropFormat, position, duration } = options
  await checkReadable(referencePath, 'Reference')
  await checkReadable(distortedPath, 'Distorted')
  checkTimingValues(position, duration)
  return crop ? parseCrop(crop, frame, cropFormat) : undefined
}

/**
 * Validates the analysis options, probing both videos.
 * {@link checkOptions} runs before `probe` is called.
 * @param options the configured options
 * @param frame the required video resolution
 * @param probe reads the video information
 */
export async function validateRequest(
  options: AnalysisOptions,
  frame: FrameSize,
  probe: (fpath: string) => Promise<VideoInfo>,
): Promise<AnalysisRequest> {
  const { referencePath, distortedPath, position, duration } = options
  const crop = await checkOptions(options, frame)

  log.info('Scanning media...')
  const reference = await probe(referencePath)
  const distorted = await probe(distortedPath)

  log.info('Verifying arguments...')
  checkResolution(referencePath, reference, frame)
  checkResolution(distortedPath, distorted, frame)
  checkTiming(position, duration, reference.duration)

  return {
    referencePath,
    distortedPath,
    reference,
    distorted,
    crop,
    position,
    duration,
    metrics: options.metrics,
    modelPath: options.modelPath,
    subsample: options.subsample,
    threads: options.threads,
  }
}
