import { describe, expect, it } from 'vitest'

import { ConfigurationError, ExecutionError, ParseError, exitCodeFor } from '../src/errors'
import { formatCommand, runCommand, shellQuote, splitList, toPrecision } from '../src/utils'

describe('shellQuote', () => {
  it('keeps safe words unchanged', () => {
    expect(shellQuote('/videos/clip-1.mp4')).toBe('/videos/clip-1.mp4')
    expect(shellQuote('stream=width,height:format=duration')).toBe('stream=width,height:format=duration')
  })

  it('quotes the other words', () => {
    expect(shellQuote('')).toBe(`''`)
    expect(shellQuote('my clip.mp4')).toBe(`'my clip.mp4'`)
    expect(shellQuote('[0:v]setpts=PTS-STARTPTS[dist]')).toBe(`'[0:v]setpts=PTS-STARTPTS[dist]'`)
    expect(shellQuote("it's")).toBe(`'it'"'"'s'`)
  })
})

describe('formatCommand', () => {
  it('joins the quoted command line', () => {
    expect(formatCommand('ffmpeg', ['-i', 'a b.mp4', '-f', 'null', '-'])).toBe(`ffmpeg -i 'a b.mp4' -f null -`)
  })
})

describe('toPrecision', () => {
  it('rounds to the given decimal places', () => {
    expect(toPrecision(1.23456)).toBe('1.235')
    expect(toPrecision(95.5, 6)).toBe('95.500000')
    expect(toPrecision(2, 0)).toBe('2')
  })
})

describe('splitList', () => {
  it('splits and trims the items', () => {
    expect(splitList(' a.mp4, b.mp4 ,,c.mp4,')).toEqual(['a.mp4', 'b.mp4', 'c.mp4'])
    expect(splitList('')).toEqual([])
  })
})

describe('runCommand', () => {
  it('rejects when the executable does not exist', async () => {
    const error = await runCommand('vqscore-missing-executable', ['-version']).catch((err: unknown) => err)
    expect(error).toBeInstanceOf(ExecutionError)
    expect(error).toHaveProperty('status', null)
    expect(error).toHaveProperty('message', 'vqscore-missing-executable failed (ENOENT)')
  })
})

describe('exitCodeFor', () => {
  it('maps the errors to the exit codes', () => {
    expect(exitCodeFor(new ConfigurationError('bad'))).toBe(2)
    expect(exitCodeFor(new ExecutionError('failed', 1, ''))).toBe(3)
    expect(exitCodeFor(new ParseError('bad output'))).toBe(4)
    expect(exitCodeFor(new Error('unexpected'))).toBe(1)
    expect(exitCodeFor('unexpected')).toBe(1)
  })
})
