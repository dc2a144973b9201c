import { paramCase } from 'change-case'
import convict, { addFormats, addParser } from 'convict'
import { existsSync } from 'fs'
import json5 from 'json5'
import os from 'os'
import wrap from 'word-wrap'

import { ConfigurationError } from './errors'
import type { ToolPaths } from './media'
import { selectMetrics } from './metrics'
import type { AnalysisOptions, CropFormat, FrameSize, LogFormat } from './types'
import { logger, splitList } from './utils'

const log = logger('vqscore:config')

const float = {
  name: 'float',
  coerce: (v: string) => parseFloat(v),
  validate: (v: number) => {
    if (!Number.isFinite(v)) throw new Error(`Invalid float: ${v}`)
  },
}

addFormats({ float })
addParser([
  { extension: 'json', parse: json5.parse },
  { extension: 'json5', parse: json5.parse },
])

export type Config = {
  reference: string
  distorted: string
  crop: string
  cropFormat: CropFormat
  position: number | null
  duration: number | null
  psnr: boolean
  ssim: boolean
  msSsim: boolean
  model: string
  modelSearchPaths: string
  subsample: number
  threads: number
  logFormat: LogFormat
  outputDir: string
  overwrite: boolean
  dryRun: boolean
  ffmpegPath: string
  ffprobePath: string
  verifyTools: boolean
  frameWidth: number
  frameHeight: number
}

type ConfigSchema = {
  [K in keyof Config]: convict.SchemaObj<Config[K]> & { doc: string; env: string; arg: string }
}

const DEFAULT_MODEL_SEARCH_PATHS =
  process.platform === 'win32' ? '' : '/usr/local/share/model/vmaf_v0.6.1.json,/usr/share/model/vmaf_v0.6.1.json'

// config schema
const configSchema: ConfigSchema = {
  reference: {
    doc: `The reference (original) video path.`,
    format: String,
    default: '',
    env: 'REFERENCE',
    arg: 'reference',
  },
  distorted: {
    doc: `The distorted video path to evaluate; multiple videos can be \
separated by a comma.`,
    format: String,
    default: '',
    env: 'DISTORTED',
    arg: 'distorted',
  },
  crop: {
    doc: `The crop of the distorted video relative to the reference video, \
in \`WIDTH:HEIGHT:X:Y\` format. The same area is compared in both videos.`,
    format: String,
    default: '',
    env: 'CROP',
    arg: 'crop',
  },
  cropFormat: {
    doc: `The crop value format: \`ffmpeg\` (\`WIDTH:HEIGHT:X:Y\`), \
\`handbrake\` (\`TOP:BOTTOM:LEFT:RIGHT\`) or \`auto\` (\`TOP:BOTTOM:LEFT:RIGHT\` \
when every margin is at most a quarter of the frame side).`,
    format: ['ffmpeg', 'handbrake', 'auto'],
    default: 'ffmpeg',
    env: 'CROP_FORMAT',
    arg: 'crop-format',
  },
  position: {
    doc: `The time in seconds in the reference video to start from.`,
    format: 'float',
    default: null,
    nullable: true,
    env: 'POSITION',
    arg: 'position',
  },
  duration: {
    doc: `The duration in seconds of the clip from the reference video.`,
    format: 'float',
    default: null,
    nullable: true,
    env: 'DURATION',
    arg: 'duration',
  },
  psnr: {
    doc: `Enables computing PSNR.`,
    format: 'Boolean',
    default: false,
    env: 'PSNR',
    arg: 'psnr',
  },
  ssim: {
    doc: `Enables computing SSIM.`,
    format: 'Boolean',
    default: false,
    env: 'SSIM',
    arg: 'ssim',
  },
  msSsim: {
    doc: `Enables computing MS-SSIM.`,
    format: 'Boolean',
    default: false,
    env: 'MS_SSIM',
    arg: 'ms-ssim',
  },
  model: {
    doc: `The VMAF model path. If empty, the first existing file in the \
model search paths is used.`,
    format: String,
    default: '',
    env: 'VMAF_MODEL',
    arg: 'model',
  },
  modelSearchPaths: {
    doc: `The comma separated list of default VMAF model locations.`,
    format: String,
    default: DEFAULT_MODEL_SEARCH_PATHS,
    env: 'VMAF_MODEL_SEARCH_PATHS',
    arg: 'model-search-paths',
  },
  subsample: {
    doc: `The interval for frame subsampling.`,
    format: 'nat',
    default: 1,
    env: 'VMAF_SUBSAMPLE',
    arg: 'subsample',
  },
  threads: {
    doc: `The number of threads used by libvmaf; 0 uses all the available CPUs.`,
    format: 'nat',
    default: 0,
    env: 'VMAF_THREADS',
    arg: 'threads',
  },
  logFormat: {
    doc: `The libvmaf log format used to read the per-frame scores.`,
    format: ['json', 'csv'],
    default: 'json',
    env: 'VMAF_LOG_FORMAT',
    arg: 'log-format',
  },
  outputDir: {
    doc: `The directory where the \`<name>-quality.csv\` files are written; \
the current directory if empty.`,
    format: String,
    default: '',
    env: 'OUTPUT_DIR',
    arg: 'output-dir',
  },
  overwrite: {
    doc: `If true, existing output files are overwritten.`,
    format: 'Boolean',
    default: false,
    env: 'OVERWRITE',
    arg: 'overwrite',
  },
  dryRun: {
    doc: `Prints the FFmpeg command and exits.`,
    format: 'Boolean',
    default: false,
    env: 'DRY_RUN',
    arg: 'dry-run',
  },
  ffmpegPath: {
    doc: `The FFmpeg executable, built with libvmaf support.`,
    format: String,
    default: 'ffmpeg',
    env: 'FFMPEG_PATH',
    arg: 'ffmpeg-path',
  },
  ffprobePath: {
    doc: `The FFprobe executable.`,
    format: String,
    default: 'ffprobe',
    env: 'FFPROBE_PATH',
    arg: 'ffprobe-path',
  },
  verifyTools: {
    doc: `If true, the FFmpeg, FFprobe and libvmaf availability is checked \
before scanning the media.`,
    format: 'Boolean',
    default: true,
    env: 'VERIFY_TOOLS',
    arg: 'verify-tools',
  },
  frameWidth: {
    doc: `The required width of both videos.`,
    format: 'nat',
    default: 1920,
    env: 'FRAME_WIDTH',
    arg: 'frame-width',
  },
  frameHeight: {
    doc: `The required height of both videos.`,
    format: 'nat',
    default: 1080,
    env: 'FRAME_HEIGHT',
    arg: 'frame-height',
  },
}

/** The options shown only by `--full-help`. */
const ADVANCED_OPTIONS: ReadonlySet<string> = new Set<keyof Config>([
  'cropFormat',
  'modelSearchPaths',
  'subsample',
  'threads',
  'logFormat',
  'outputDir',
  'overwrite',
  'ffmpegPath',
  'ffprobePath',
  'verifyTools',
  'frameWidth',
  'frameHeight',
])

/** The single letter aliases of the command line flags. */
const SHORT_FLAGS: Readonly<Record<string, string>> = {
  r: 'reference',
  n: 'dry-run',
  h: 'help',
}

/** Replaces the short flags (`-r`, `-n`, `-h`) with their long names. */
export function expandShortFlags(args: string[]): string[] {
  return args.map(arg => {
    const name = /^-([a-z])$/.exec(arg)?.[1]
    const long = name !== undefined ? SHORT_FLAGS[name] : undefined
    return long ? `--${long}` : arg
  })
}

const shortFlagOf = (flag: string): string | undefined =>
  Object.keys(SHORT_FLAGS).find(short => SHORT_FLAGS[short] === flag)

type ConfigDocs = Record<string, { doc: string; default: string; advanced: boolean }>

/**
 * It returns the formatted configuration docs.
 */
export function getConfigDocs(): ConfigDocs {
  const docs: ConfigDocs = {}
  for (const [name, value] of Object.entries(configSchema)) {
    docs[name] = {
      doc: value.doc,
      default: JSON.stringify(value.default),
      advanced: ADVANCED_OPTIONS.has(name),
    }
  }
  return docs
}

/**
 * Formats the command line help.
 * @param full if true, the advanced options are included
 */
export function formatHelp(full = false): string {
  let out = `Calculates frame-by-frame VMAF score for distorted videos relative to a \
reference video and saves results in CSV files.

Usage: vqscore --reference PATH --distorted PATH[,PATH...] [OPTIONS...]

Params:
`
  Object.entries(getConfigDocs()).forEach(([name, value]) => {
    if (value.advanced && !full) return
    const flag = paramCase(name)
    const short = shortFlagOf(flag)
    out += `  --${flag}${short ? `, -${short}` : ''}
${wrap(value.doc, { width: 72, indent: '        ' })}
        Default: ${value.default}\n`
  })
  out += `  --help, -h
        It shows the basic options.
  --full-help
        It shows all the options.
  --version
        It shows the package version.

Requires FFprobe and FFmpeg with VMAF support.
`
  return out
}

/**
 * Loads the config object.
 * @param filePath an optional JSON or JSON5 config file
 * @param values values used when no config file is given
 * @param opts the command line arguments and environment to read
 */
export function loadConfig(
  filePath?: string,
  values?: Partial<Config>,
  opts?: { args?: string[]; env?: NodeJS.ProcessEnv },
): Config {
  const config = convict<Config>(configSchema, opts)
  try {
    if (filePath && existsSync(filePath)) {
      log.debug(`Loading config from ${filePath}`)
      config.loadFile(filePath)
    } else if (values) {
      log.debug('Loading config from values.')
      config.load(values)
    } else {
      log.debug('Using default values.')
    }
    config.validate({ allowed: 'strict' })
  } catch (err) {
    throw new ConfigurationError((err as Error).message)
  }

  const properties = config.getProperties()
  log.debug('Using config:', properties)
  return properties
}

/**
 * Returns the VMAF model path: the configured one, if it exists, or the
 * first existing search path. When no search path exists, it returns
 * undefined and libvmaf uses its built-in model; without search paths
 * (no default location on the platform) the model must be configured.
 */
export function resolveModelPath(
  model: string,
  searchPaths: string[],
  exists: (fpath: string) => boolean = existsSync,
): string | undefined {
  if (model) {
    if (!exists(model)) {
      throw new ConfigurationError(`Model file does not exist: ${model}`)
    }
    return model
  }
  if (!searchPaths.length) {
    throw new ConfigurationError('No default VMAF model location on this platform; set it with --model')
  }
  const found = searchPaths.find(p => exists(p))
  if (!found) {
    log.info(`VMAF model not found in ${searchPaths.join(', ')}, using the libvmaf built-in model`)
  }
  return found
}

/** The settings of a run, resolved once at startup. */
export type Settings = {
  reference: string
  distorted: string[]
  options: Omit<AnalysisOptions, 'referencePath' | 'distortedPath'>
  tools: ToolPaths
  frame: FrameSize
  logFormat: LogFormat
  outputDir: string
  overwrite: boolean
  dryRun: boolean
  verifyTools: boolean
}

/**
 * Resolves the run settings from the config, checking the required values.
 */
export function resolveSettings(config: Config, exists: (fpath: string) => boolean = existsSync): Settings {
  if (!config.reference) {
    throw new ConfigurationError('The reference video path is required (--reference)')
  }
  const distorted = splitList(config.distorted)
  if (!distorted.length) {
    throw new ConfigurationError('At least one distorted video path is required (--distorted)')
  }
  if (config.subsample < 1) {
    throw new ConfigurationError(`Invalid subsample interval: ${config.subsample}`)
  }
  return {
    reference: config.reference,
    distorted,
    options: {
      crop: config.crop || undefined,
      cropFormat: config.cropFormat,
      position: config.position ?? undefined,
      duration: config.duration ?? undefined,
      metrics: selectMetrics(config),
      modelPath: resolveModelPath(config.model, splitList(config.modelSearchPaths), exists),
      subsample: config.subsample,
      threads: config.threads || os.cpus().length,
    },
    tools: { ffmpeg: config.ffmpegPath, ffprobe: config.ffprobePath },
    frame: { width: config.frameWidth, height: config.frameHeight },
    logFormat: config.logFormat,
    outputDir: config.outputDir || process.cwd(),
    overwrite: config.overwrite,
    dryRun: config.dryRun,
    verifyTools: config.verifyTools,
  }
}
