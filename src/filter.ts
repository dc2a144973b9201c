import { Metrics } from './metrics'
import type { AnalysisRequest, CropRect, LogFormat, MetricName } from './types'

/**
 * Escapes a filter option value for both the option and the filter graph
 * parsing levels.
 */
export function escapeFilterValue(value: string): string {
  const optionEscaped = value.replace(/[\\':]/g, c => `\\${c}`)
  return optionEscaped.replace(/[\\'[\],;]/g, c => `\\${c}`)
}

export const cropFilter = (crop?: CropRect, suffix = ''): string => {
  if (!crop) return ''
  const { width, height, x, y } = crop
  return `crop=w=${width}:h=${height}:x=${x}:y=${y}:exact=1${suffix}`
}

/**
 * Selects the `[position, position + duration)` interval of the stream.
 */
export const trimFilter = (position?: number, duration?: number, suffix = ''): string => {
  const options: string[] = []
  if (position) options.push(`start=${position}`)
  if (duration !== undefined) options.push(`duration=${duration}`)
  if (!options.length) return ''
  return `trim=${options.join(':')}${suffix}`
}

export type LibvmafOptions = {
  metrics: readonly MetricName[]
  modelPath?: string
  logPath: string
  logFormat: LogFormat
  subsample: number
  threads: number
}

export const libvmafFilter = ({ metrics, modelPath, logPath, logFormat, subsample, threads }: LibvmafOptions): string => {
  const options: string[] = []
  if (modelPath) options.push(`model=path=${escapeFilterValue(modelPath)}`)
  const features = metrics.flatMap(m => {
    const { feature } = Metrics[m]
    return feature ? [`name=${feature}`] : []
  })
  if (features.length) options.push(`feature=${features.join('|')}`)
  options.push(
    `log_fmt=${logFormat}`,
    `log_path=${escapeFilterValue(logPath)}`,
    `n_subsample=${subsample}`,
    `n_threads=${threads}`,
    'shortest=1',
  )
  return `libvmaf=${options.join(':')}`
}

/**
 * Builds the `-filter_complex` graph comparing the distorted video (input 0)
 * with the reference video (input 1).
 *
 * The reference is trimmed to the requested interval; the crop rectangle, in
 * reference frame coordinates, is applied to both streams before the
 * libvmaf filter pairs their frames.
 */
export function buildFilterGraph(
  request: Pick<AnalysisRequest, 'crop' | 'position' | 'duration' | 'metrics' | 'modelPath' | 'subsample' | 'threads'>,
  logPath: string,
  logFormat: LogFormat = 'json',
): string {
  const { crop, position, duration } = request
  const dist = `[0:v]${cropFilter(crop, ',')}setpts=PTS-STARTPTS[dist]`
  const ref = `[1:v]${trimFilter(position, duration, ',')}${cropFilter(crop, ',')}setpts=PTS-STARTPTS[ref]`
  const vmaf = `[dist][ref]${libvmafFilter({ ...request, logPath, logFormat })}`
  return `${dist};${ref};${vmaf}`
}

/**
 * Builds the ffmpeg arguments running the comparison.
 */
export function buildFfmpegArgs(
  request: Pick<
    AnalysisRequest,
    'referencePath' | 'distortedPath' | 'crop' | 'position' | 'duration' | 'metrics' | 'modelPath' | 'subsample' | 'threads'
  >,
  logPath: string,
  logFormat: LogFormat = 'json',
): string[] {
  return [
    '-hide_banner',
    '-nostdin',
    '-loglevel',
    'error',
    '-i',
    request.distortedPath,
    '-i',
    request.referencePath,
    '-filter_complex',
    buildFilterGraph(request, logPath, logFormat),
    '-f',
    'null',
    '-',
  ]
}
