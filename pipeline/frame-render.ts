/**
 * Frame rendering
 * Caption -> static frame -> fixed-frame-rate clip muxed with its audio
 */

import * as fs from 'fs'
import sharp from 'sharp'
import type { StageResult, VideoSettings } from '../shared/types'
import { stageFail, stageOk } from '../shared/types'
import { errorMessage } from './errors'
import { encoderStageError, probeDuration, type EncoderInvoker } from './media-encoder'

const LINE_HEIGHT_FACTOR = 1.2

// Generic families always resolve, so a missing preferred font falls back
const FALLBACK_FONTS = 'Helvetica, sans-serif'

/**
 * SVG in, PNG on disk out
 */
export interface FrameRasterizer {
  rasterize(svg: string, outputPath: string): Promise<void>
}

export class SharpRasterizer implements FrameRasterizer {
  async rasterize(svg: string, outputPath: string): Promise<void> {
    await sharp(Buffer.from(svg)).png().toFile(outputPath)
  }
}

function splitLongWord(word: string, width: number): string[] {
  const pieces: string[] = []
  for (let i = 0; i < word.length; i += width) {
    pieces.push(word.slice(i, i + width))
  }
  return pieces
}

/**
 * Greedy word wrap at `width` columns, per input line.
 * Words longer than a line are broken.
 */
export function wrapCaption(caption: string, width: number): string[] {
  const lines: string[] = []

  for (const rawLine of caption.split(/\r?\n/)) {
    const words = rawLine.split(/\s+/).filter(Boolean)
    if (words.length === 0) {
      lines.push('')
      continue
    }

    let current = ''
    for (const word of words) {
      for (const piece of splitLongWord(word, width)) {
        if (current.length === 0) {
          current = piece
        } else if (current.length + 1 + piece.length <= width) {
          current += ` ${piece}`
        } else {
          lines.push(current)
          current = piece
        }
      }
    }
    lines.push(current)
  }

  return lines
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')
}

function fmt(value: number): string {
  return String(Math.round(value * 10) / 10)
}

/**
 * White canvas, black text, lines centered horizontally and the block
 * centered vertically.
 */
export function buildCaptionSvg(lines: readonly string[], video: Readonly<VideoSettings>): string {
  const { width, height, fontSize } = video
  const lineHeight = fontSize * LINE_HEIGHT_FACTOR
  const top = (height - lines.length * lineHeight) / 2
  const centerX = fmt(width / 2)
  const fontFamily = escapeXml(`${video.fontFamily}, ${FALLBACK_FONTS}`)

  const spans = lines.map((line, i) =>
    `<tspan x="${centerX}" y="${fmt(top + i * lineHeight + fontSize)}">${escapeXml(line)}</tspan>`
  )

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<rect width="${width}" height="${height}" fill="#ffffff"/>`,
    `<text font-family="${fontFamily}" font-size="${fontSize}" fill="#000000" text-anchor="middle" xml:space="preserve">${spans.join('')}</text>`,
    '</svg>'
  ].join('\n')
}

/**
 * Clip length: the audio minus two frame intervals, so consecutive clips do
 * not carry an audible artifact at the join.
 */
export function clipDurationFor(audioDurationSec: number, fps: number): number {
  return audioDurationSec - 2.0 / fps
}

export class FrameRenderer {
  private invoke: EncoderInvoker
  private rasterizer: FrameRasterizer
  private video: Readonly<VideoSettings>

  constructor(invoke: EncoderInvoker, rasterizer: FrameRasterizer, video: Readonly<VideoSettings>) {
    this.invoke = invoke
    this.rasterizer = rasterizer
    this.video = video
  }

  async renderClip(
    caption: string,
    audioPath: string,
    outputPath: string,
    framePath: string
  ): Promise<StageResult<string>> {
    const probe = await probeDuration(this.invoke, audioPath)
    if (!probe.success) {
      return stageFail(encoderStageError('render', 'probe audio duration', probe.error))
    }

    const durationSec = clipDurationFor(probe.durationSec, this.video.fps)
    if (durationSec <= 0) {
      return stageFail({ stage: 'render', message: `audio too short for a clip (${probe.durationSec}s)` })
    }

    const svg = buildCaptionSvg(wrapCaption(caption, this.video.textWrapWidth), this.video)
    try {
      await this.rasterizer.rasterize(svg, framePath)
    } catch (err) {
      return stageFail({ stage: 'render', message: `rasterize caption: ${errorMessage(err)}` })
    }

    const muxed = await this.invoke({
      op: 'mux-still',
      image: framePath,
      audio: audioPath,
      output: outputPath,
      durationSec,
      fps: this.video.fps
    })
    if (!muxed.success) {
      return stageFail(encoderStageError('render', 'mux clip', muxed.error))
    }

    fs.rmSync(framePath, { force: true })
    return stageOk(outputPath)
  }
}
