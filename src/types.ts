export type MetricName = 'vmaf' | 'psnr' | 'ssim' | 'ms_ssim'

export type CropFormat = 'ffmpeg' | 'handbrake' | 'auto'

export type LogFormat = 'json' | 'csv'

export type FrameSize = {
  width: number
  height: number
}

export type VideoInfo = FrameSize & {
  /** The container duration in seconds. */
  duration: number
}

/** A crop rectangle in reference frame coordinates. */
export type CropRect = {
  width: number
  height: number
  x: number
  y: number
}

/** The analysis parameters as configured, before validation. */
export type AnalysisOptions = {
  referencePath: string
  distortedPath: string
  crop?: string
  cropFormat: CropFormat
  /** The reference start time in seconds. */
  position?: number
  /** The reference clip duration in seconds. */
  duration?: number
  metrics: MetricName[]
  modelPath?: string
  subsample: number
  threads: number
}

/** A validated analysis request. */
export type AnalysisRequest = Omit<AnalysisOptions, 'crop' | 'cropFormat'> & {
  reference: VideoInfo
  distorted: VideoInfo
  crop?: CropRect
}

export type FrameScore = {
  readonly frame: number
  readonly metrics: ReadonlyMap<MetricName, number>
}

export type MetricSummary = {
  count: number
  mean: number
  min: number
  max: number
  /** The 5th percentile. */
  p5: number
  stddev: number
}

export type SummaryReport = ReadonlyMap<MetricName, Readonly<MetricSummary>>
