import * as fs from 'fs'
import * as path from 'path'
import { v4 as uuidv4 } from 'uuid'
import type { EncoderInvoker } from '../media-encoder'
import { ensureTempRoot } from '../work-dir'
import type { SpeechClient, SpeechRequest } from './speech-client'

const TONE_DURATION_SEC = 2.0
const TONE_FREQUENCY_HZ = 440

/**
 * Offline backend: a 2 s sine tone instead of speech.
 * Lets the whole pipeline run without the speech service.
 */
export class ToneSpeechClient implements SpeechClient {
  private invoke: EncoderInvoker
  private scratchDir: string

  constructor(invoke: EncoderInvoker, scratchDir: string) {
    this.invoke = invoke
    this.scratchDir = scratchDir
  }

  async createSpeech(request: SpeechRequest): Promise<Buffer> {
    const tonePath = path.join(ensureTempRoot(this.scratchDir), `tone-${uuidv4()}.mp3`)

    const result = await this.invoke({
      op: 'generate-tone',
      output: tonePath,
      durationSec: TONE_DURATION_SEC,
      frequency: TONE_FREQUENCY_HZ
    })
    if (!result.success) {
      throw new Error(`Tone generation failed for "${request.text.substring(0, 30)}": ${result.error.message}`)
    }

    try {
      return fs.readFileSync(tonePath)
    } finally {
      fs.rmSync(tonePath, { force: true })
    }
  }
}
