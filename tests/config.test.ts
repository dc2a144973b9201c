import fs from 'fs'
import os from 'os'
import path from 'path'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'

import { Config, expandShortFlags, formatHelp, loadConfig, resolveModelPath, resolveSettings } from '../src/config'
import { ConfigurationError } from '../src/errors'

const load = (args: string[], env: NodeJS.ProcessEnv = {}) => loadConfig(undefined, undefined, { args, env })

describe('loadConfig', () => {
  it('uses the default values', () => {
    const config = load([])
    expect(config.reference).toBe('')
    expect(config.position).toBeNull()
    expect(config.duration).toBeNull()
    expect(config.cropFormat).toBe('ffmpeg')
    expect(config.logFormat).toBe('json')
    expect(config.frameWidth).toBe(1920)
    expect(config.frameHeight).toBe(1080)
    expect(config.subsample).toBe(1)
    expect(config.verifyTools).toBe(true)
    expect(config.psnr).toBe(false)
  })

  it('reads the command line arguments', () => {
    const config = load([
      '--reference',
      'ref.mp4',
      '--distorted',
      'a.mp4,b.mp4',
      '--crop',
      '1280:720:0:0',
      '--position',
      '5',
      '--duration',
      '10.5',
      '--psnr',
      '--ms-ssim',
    ])
    expect(config.reference).toBe('ref.mp4')
    expect(config.distorted).toBe('a.mp4,b.mp4')
    expect(config.crop).toBe('1280:720:0:0')
    expect(config.position).toBe(5)
    expect(config.duration).toBe(10.5)
    expect(config.psnr).toBe(true)
    expect(config.ssim).toBe(false)
    expect(config.msSsim).toBe(true)
  })

  it('reads the environment variables', () => {
    const config = load([], { REFERENCE: 'env-ref.mp4', DURATION: '7.5', SSIM: 'true', VMAF_THREADS: '3' })
    expect(config.reference).toBe('env-ref.mp4')
    expect(config.duration).toBe(7.5)
    expect(config.ssim).toBe(true)
    expect(config.threads).toBe(3)
  })

  it('gives precedence to the arguments', () => {
    expect(load(['--reference', 'arg.mp4'], { REFERENCE: 'env.mp4' }).reference).toBe('arg.mp4')
  })

  it('rejects invalid values', () => {
    expect(() => load(['--crop-format', 'square'])).toThrow(ConfigurationError)
    expect(() => load(['--log-format', 'xml'])).toThrow(ConfigurationError)
    expect(() => load([], { POSITION: 'soon' })).toThrow(ConfigurationError)
  })

  describe('config file', () => {
    let dir: string

    beforeAll(async () => {
      dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'vqscore-config-'))
    })

    afterAll(async () => {
      await fs.promises.rm(dir, { recursive: true, force: true })
    })

    it('loads a JSON5 file', async () => {
      const fpath = path.join(dir, 'config.json5')
      await fs.promises.writeFile(fpath, `{\n  // the source\n  reference: 'file-ref.mp4',\n  threads: 4,\n}\n`)
      const config = loadConfig(fpath, undefined, { args: ['--threads', '2'], env: {} })
      expect(config.reference).toBe('file-ref.mp4')
      expect(config.threads).toBe(2)
    })

    it('rejects unknown keys', async () => {
      const fpath = path.join(dir, 'unknown.json')
      await fs.promises.writeFile(fpath, '{ "unknown": 1 }')
      expect(() => loadConfig(fpath, undefined, { args: [], env: {} })).toThrow(ConfigurationError)
    })
  })

  it('loads the given values', () => {
    const config = loadConfig(undefined, { reference: 'values.mp4', overwrite: true }, { args: [], env: {} })
    expect(config.reference).toBe('values.mp4')
    expect(config.overwrite).toBe(true)
  })
})

describe('expandShortFlags', () => {
  it('replaces the short flags', () => {
    expect(expandShortFlags(['-r', 'ref.mp4', '-n', '--distorted', 'a.mp4', '-h'])).toEqual([
      '--reference',
      'ref.mp4',
      '--dry-run',
      '--distorted',
      'a.mp4',
      '--help',
    ])
  })

  it('keeps the other arguments', () => {
    expect(expandShortFlags(['-x', '-rn', '--position', '-1'])).toEqual(['-x', '-rn', '--position', '-1'])
  })

  it('feeds the config', () => {
    const config = load(expandShortFlags(['-r', 'ref.mp4', '-n']))
    expect(config.reference).toBe('ref.mp4')
    expect(config.dryRun).toBe(true)
  })
})

describe('resolveModelPath', () => {
  const exists = (fpath: string) => fpath === '/usr/share/model/vmaf_v0.6.1.json' || fpath === '/models/custom.json'

  it('uses the configured model', () => {
    expect(resolveModelPath('/models/custom.json', [], exists)).toBe('/models/custom.json')
  })

  it('rejects a missing configured model', () => {
    expect(() => resolveModelPath('/models/missing.json', [], exists)).toThrow('Model file does not exist')
  })

  it('uses the first existing search path', () => {
    expect(
      resolveModelPath('', ['/usr/local/share/model/vmaf_v0.6.1.json', '/usr/share/model/vmaf_v0.6.1.json'], exists),
    ).toBe('/usr/share/model/vmaf_v0.6.1.json')
  })

  it('requires a model when the platform has no default location', () => {
    expect(() => resolveModelPath('', [], exists)).toThrow(
      new ConfigurationError('No default VMAF model location on this platform; set it with --model'),
    )
  })

  it('falls back to the libvmaf built-in model', () => {
    expect(resolveModelPath('', ['/opt/none.json'], exists)).toBeUndefined()
  })
})

describe('resolveSettings', () => {
  const exists = () => true
  const config = (values: Partial<Config>): Config => ({
    ...load([]),
    reference: 'ref.mp4',
    distorted: 'a.mp4, b.mp4',
    modelSearchPaths: '/models/vmaf.json',
    ...values,
  })

  it('resolves the run settings', () => {
    const settings = resolveSettings(
      config({ crop: '1280:720:0:0', position: 0, duration: 10, ssim: true, threads: 6, outputDir: '/out' }),
      exists,
    )
    expect(settings).toEqual({
      reference: 'ref.mp4',
      distorted: ['a.mp4', 'b.mp4'],
      options: {
        crop: '1280:720:0:0',
        cropFormat: 'ffmpeg',
        position: 0,
        duration: 10,
        metrics: ['vmaf', 'ssim'],
        modelPath: '/models/vmaf.json',
        subsample: 1,
        threads: 6,
      },
      tools: { ffmpeg: 'ffmpeg', ffprobe: 'ffprobe' },
      frame: { width: 1920, height: 1080 },
      logFormat: 'json',
      outputDir: '/out',
      overwrite: false,
      dryRun: false,
      verifyTools: true,
    })
  })

  it('leaves the model unset when no search path exists', () => {
    expect(resolveSettings(config({}), () => false).options.modelPath).toBeUndefined()
  })

  it('keeps a zero duration for validation', () => {
    expect(resolveSettings(config({ duration: 0 }), exists).options.duration).toBe(0)
  })

  it('drops the unset values', () => {
    const { options } = resolveSettings(config({}), exists)
    expect(options.crop).toBeUndefined()
    expect(options.position).toBeUndefined()
    expect(options.duration).toBeUndefined()
  })

  it('uses every CPU by default', () => {
    expect(resolveSettings(config({ threads: 0 }), exists).options.threads).toBe(os.cpus().length)
  })

  it('requires the reference and distorted videos', () => {
    expect(() => resolveSettings(config({ reference: '' }), exists)).toThrow(/reference video path is required/)
    expect(() => resolveSettings(config({ distorted: ' , ' }), exists)).toThrow(/distorted video path is required/)
  })

  it('rejects a zero subsample interval', () => {
    expect(() => resolveSettings(config({ subsample: 0 }), exists)).toThrow(ConfigurationError)
  })
})

describe('formatHelp', () => {
  it('lists the basic options', () => {
    const help = formatHelp()
    expect(help).toContain('\n  --reference, -r\n')
    expect(help).toContain('\n  --crop\n')
    expect(help).toContain('\n  --ms-ssim\n')
    expect(help).toContain('\n  --dry-run, -n\n')
    expect(help).toContain('\n  --help, -h\n')
    expect(help).toContain('\n  --full-help\n')
    expect(help).not.toContain('\n  --crop-format\n')
  })

  it('lists every option with the full help', () => {
    const help = formatHelp(true)
    expect(help).toContain('\n  --crop-format\n')
    expect(help).toContain('\n  --subsample\n')
    expect(help).toContain('\n  --threads\n')
    expect(help).toContain('        Default: 1920\n')
  })
})
