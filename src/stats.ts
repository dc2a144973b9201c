import chalk from 'chalk'
import { Stats as FastStats } from 'fast-stats'
import * as fs from 'fs'
import * as path from 'path'
import { sprintf } from 'sprintf-js'

import { ParseError } from './errors'
import { Metrics } from './metrics'
import type { FrameScore, MetricName, MetricSummary, SummaryReport } from './types'
import { logger, toPrecision } from './utils'

const log = logger('vqscore:stats')

/**
 * Computes the per-metric statistics of the frame scores.
 */
export function summarize(frames: readonly FrameScore[], metrics: readonly MetricName[]): SummaryReport {
  if (!frames.length) {
    throw new ParseError('no frame scores to summarize')
  }
  const report = new Map<MetricName, Readonly<MetricSummary>>()
  for (const metric of metrics) {
    const s = new FastStats()
    for (const { frame, metrics: scores } of frames) {
      const value = scores.get(metric)
      if (value === undefined) {
        throw new ParseError(`${Metrics[metric].label} score missing for frame ${frame}`)
      }
      s.push(value)
    }
    report.set(
      metric,
      Object.freeze({
        count: s.length || 0,
        mean: s.amean() || 0,
        min: s.min || 0,
        max: s.max || 0,
        p5: s.percentile(5) || 0,
        stddev: s.stddev() || 0,
      }),
    )
  }
  return report
}

/**
 * Formats the frame scores as CSV, one row per frame.
 */
export function formatCsv(frames: readonly FrameScore[], metrics: readonly MetricName[]): string {
  let data = `frame,${metrics.join(',')}\n`
  for (const { frame, metrics: scores } of frames) {
    data += `${frame}`
    metrics.forEach(metric => {
      const value = scores.get(metric)
      if (value === undefined) {
        throw new ParseError(`${Metrics[metric].label} score missing for frame ${frame}`)
      }
      data += `,${toPrecision(value, 6)}`
    })
    data += '\n'
  }
  return data
}

export async function writeCsv(
  fname: string,
  frames: readonly FrameScore[],
  metrics: readonly MetricName[],
): Promise<void> {
  const data = formatCsv(frames, metrics)
  await fs.promises.mkdir(path.dirname(fname), { recursive: true })
  await fs.promises.writeFile(fname, data)
  log.debug(`writeCsv ${fname}: ${frames.length} frames`)
}

/**
 * Formats the console stats title.
 * @param name
 */
function sprintfStatsTitle(name: string): string {
  return sprintf(chalk`-- {bold %(name)s} %(fill)s\n`, {
    name,
    fill: '-'.repeat(Math.max(72 - name.length - 4, 0)),
  })
}

/**
 * Formats the console stats header.
 */
function sprintfStatsHeader(): string {
  return sprintf(
    chalk`{bold %(name)' 10s} {bold %(count)' 8s} {bold %(mean)' 10s} {bold %(min)' 10s} {bold %(max)' 10s} {bold %(p5)' 10s} {bold %(stddev)' 10s}\n`,
    {
      name: 'metric',
      count: 'frames',
      mean: 'mean',
      min: 'min',
      max: 'max',
      p5: '5p',
      stddev: 'stddev',
    },
  )
}

/**
 * Format the metric stats for console output.
 */
export function sprintfStats(metric: MetricName, stats: MetricSummary): string {
  const { label, precision } = Metrics[metric]
  const format = `.${precision}f`
  return sprintf(
    chalk`{red {bold %(name)' 10s}}` +
      chalk` {bold %(count)' 8d}` +
      chalk` {bold %(mean)' 10${format}}` +
      chalk` {bold %(min)' 10${format}}` +
      chalk` {bold %(max)' 10${format}}` +
      chalk` {bold %(p5)' 10${format}}` +
      chalk` {bold %(stddev)' 10${format}}\n`,
    {
      name: label,
      ...stats,
    },
  )
}

/**
 * Formats the summary report of a distorted video for console output.
 * @param name the distorted video name
 */
export function formatSummary(name: string, report: SummaryReport): string {
  let out = sprintfStatsTitle(name) + sprintfStatsHeader()
  for (const [metric, stats] of report) {
    out += sprintfStats(metric, stats)
  }
  return out
}
