import { z } from 'zod'

import { ParseError } from './errors'
import { Metrics } from './metrics'
import type { FrameScore, LogFormat, MetricName } from './types'

/**
 * Reads the per-frame scores out of a libvmaf log. The returned frames are
 * sorted by increasing frame index.
 */
export interface MetricLogParser {
  readonly format: LogFormat
  parse(text: string, metrics: readonly MetricName[]): FrameScore[]
}

type RawFrame = {
  frame: number
  value: (key: string) => number | undefined
}

function toFrameScores(rawFrames: RawFrame[], metrics: readonly MetricName[]): FrameScore[] {
  if (!rawFrames.length) {
    throw new ParseError('no per-frame scores found in the libvmaf log')
  }
  const sorted = [...rawFrames].sort((a, b) => a.frame - b.frame)
  return sorted.map(({ frame, value }, i) => {
    if (i > 0 && sorted[i - 1].frame === frame) {
      throw new ParseError(`frame ${frame} is reported more than once`)
    }
    const scores = new Map<MetricName, number>()
    for (const metric of metrics) {
      let score: number | undefined
      for (const key of Metrics[metric].logKeys) {
        score = value(key)
        if (score !== undefined) break
      }
      if (score === undefined) {
        throw new ParseError(`${Metrics[metric].label} score missing for frame ${frame}`)
      }
      if (!Number.isFinite(score)) {
        throw new ParseError(`${Metrics[metric].label} score for frame ${frame} is not a number`)
      }
      scores.set(metric, score)
    }
    return { frame, metrics: scores }
  })
}

const jsonLogSchema = z.object({
  frames: z.array(
    z.object({
      frameNum: z.number().int().nonnegative(),
      metrics: z.record(z.number()),
    }),
  ),
})

/** Parses the `log_fmt=json` libvmaf output. */
export class JsonLogParser implements MetricLogParser {
  readonly format = 'json'

  parse(text: string, metrics: readonly MetricName[]): FrameScore[] {
    let data: unknown
    try {
      data = JSON.parse(text)
    } catch (err) {
      throw new ParseError(`libvmaf log is not valid JSON: ${(err as Error).message}`)
    }
    const result = jsonLogSchema.safeParse(data)
    if (!result.success) {
      const issue = result.error.issues[0]
      throw new ParseError(`unexpected libvmaf log format at ${issue?.path.join('.')}: ${issue?.message}`)
    }
    return toFrameScores(
      result.data.frames.map(({ frameNum, metrics: values }) => ({
        frame: frameNum,
        value: key => (Object.prototype.hasOwnProperty.call(values, key) ? values[key] : undefined),
      })),
      metrics,
    )
  }
}

/** Parses the `log_fmt=csv` libvmaf output. */
export class CsvLogParser implements MetricLogParser {
  readonly format = 'csv'

  parse(text: string, metrics: readonly MetricName[]): FrameScore[] {
    const lines = text.split(/\r?\n/).filter(line => line.trim().length > 0)
    if (!lines.length) {
      throw new ParseError('libvmaf log is empty')
    }
    const header = lines[0].split(',').map(name => name.trim())
    const frameColumn = header.findIndex(name => name.toLowerCase() === 'frame')
    if (frameColumn === -1) {
      throw new ParseError('libvmaf log has no Frame column')
    }
    const columns = new Map<string, number>()
    header.forEach((name, i) => {
      if (name && !columns.has(name)) columns.set(name, i)
    })

    const rawFrames = lines.slice(1).map((line, row) => {
      const cells = line.split(',').map(cell => cell.trim())
      const cellNumber = (i: number): number => {
        const cell = cells[i]
        if (cell === undefined || cell === '') {
          throw new ParseError(`libvmaf log row ${row + 1} is missing column ${header[i]}`)
        }
        const value = Number(cell)
        if (!Number.isFinite(value)) {
          throw new ParseError(`libvmaf log row ${row + 1} has an invalid ${header[i]} value: ${cell}`)
        }
        return value
      }
      const frame = cellNumber(frameColumn)
      if (!Number.isInteger(frame) || frame < 0) {
        throw new ParseError(`libvmaf log row ${row + 1} has an invalid frame index: ${frame}`)
      }
      return {
        frame,
        value: (key: string) => {
          const i = columns.get(key)
          return i === undefined ? undefined : cellNumber(i)
        },
      }
    })
    return toFrameScores(rawFrames, metrics)
  }
}

export function createLogParser(format: LogFormat): MetricLogParser {
  switch (format) {
    case 'json':
      return new JsonLogParser()
    case 'csv':
      return new CsvLogParser()
  }
}
