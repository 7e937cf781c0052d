/**
 * Audio post-processing
 * Tempo-adjusts a synthesized clip and appends trailing silence so playback
 * is never clipped at the end of a video.
 */

import * as fs from 'fs'
import * as path from 'path'
import type { StageResult } from '../shared/types'
import { stageFail, stageOk } from '../shared/types'
import { errorMessage } from './errors'
import { concatListContent, encoderStageError, probeDuration, type EncoderInvoker } from './media-encoder'

// Silence = 50% longer than the source plus one second
const SILENCE_FACTOR = 1.5
const SILENCE_PADDING_SEC = 1.0

export function silenceDurationFor(sourceDurationSec: number): number {
  return sourceDurationSec * SILENCE_FACTOR + SILENCE_PADDING_SEC
}

export interface AudioPostProcessorPaths {
  // Pre-padding audio written by the synthesis stage
  sourcePath: string
  silencePath: string
}

export class AudioPostProcessor {
  private invoke: EncoderInvoker
  private paths: AudioPostProcessorPaths

  constructor(invoke: EncoderInvoker, paths: AudioPostProcessorPaths) {
    this.invoke = invoke
    this.paths = paths
  }

  /**
   * Re-encode the source at `speed` into `audioPath` and append silence.
   *
   * Steps run strictly one after another; the first failure stops the chain
   * and leaves every intermediate file in place.
   */
  async padWithSilence(audioPath: string, speed: number): Promise<StageResult<string>> {
    const { sourcePath, silencePath } = this.paths

    const probe = await probeDuration(this.invoke, sourcePath)
    if (!probe.success) {
      return stageFail(encoderStageError('postprocess', 'probe source duration', probe.error))
    }

    const silenceSec = silenceDurationFor(probe.durationSec)
    console.log(`[audio] ${path.basename(audioPath)}: source ${probe.durationSec.toFixed(2)}s, silence ${silenceSec.toFixed(2)}s, tempo ${speed}`)

    const silence = await this.invoke({ op: 'generate-silence', output: silencePath, durationSec: silenceSec })
    if (!silence.success) {
      return stageFail(encoderStageError('postprocess', 'generate silence', silence.error))
    }

    const retimed = await this.invoke({ op: 'retime', input: sourcePath, output: audioPath, tempo: speed })
    if (!retimed.success) {
      return stageFail(encoderStageError('postprocess', 'apply tempo', retimed.error))
    }

    const dir = path.dirname(audioPath)
    const baseName = path.basename(audioPath)
    const listFile = path.join(dir, `concat_${path.parse(baseName).name}.txt`)
    const combinedPath = path.join(dir, `combined_${baseName}`)

    try {
      fs.writeFileSync(listFile, concatListContent([audioPath, silencePath]))
    } catch (err) {
      return stageFail({ stage: 'postprocess', message: `write concat list: ${errorMessage(err)}` })
    }

    const combined = await this.invoke({ op: 'concat', listFile, output: combinedPath })
    if (!combined.success) {
      return stageFail(encoderStageError('postprocess', 'append silence', combined.error))
    }

    try {
      fs.renameSync(combinedPath, audioPath)
      fs.unlinkSync(listFile)
    } catch (err) {
      return stageFail({ stage: 'postprocess', message: `replace ${baseName}: ${errorMessage(err)}` })
    }

    return stageOk(audioPath)
  }
}
