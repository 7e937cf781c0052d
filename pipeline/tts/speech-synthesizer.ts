/**
 * Speech synthesis stage
 * One chunk of text -> encoded audio bytes, voice picked per call
 */

import type { StageResult } from '../../shared/types'
import { stageFail, stageOk } from '../../shared/types'
import { errorMessage } from '../errors'
import type { SpeechClient } from './speech-client'

/**
 * Strategy for choosing one element of a non-empty set
 */
export interface VoiceSelector {
  pick<T>(set: readonly T[]): T
}

export class RandomVoiceSelector implements VoiceSelector {
  private random: () => number

  constructor(random: () => number = Math.random) {
    this.random = random
  }

  pick<T>(set: readonly T[]): T {
    if (set.length === 0) {
      throw new Error('Cannot pick from an empty set')
    }
    const index = Math.min(set.length - 1, Math.floor(this.random() * set.length))
    return set[index]
  }
}

export interface SynthesizedSpeech {
  audio: Buffer
  voice: string
}

export class SpeechSynthesizer {
  private client: SpeechClient
  private voices: readonly string[]

  constructor(client: SpeechClient, voices: readonly string[]) {
    this.client = client
    this.voices = voices
  }

  /**
   * Never throws: any client or selection error becomes a synthesis failure
   * so one bad chunk cannot stop the run.
   */
  async synthesize(text: string, voiceSelector: VoiceSelector): Promise<StageResult<SynthesizedSpeech>> {
    let voice = ''
    try {
      voice = voiceSelector.pick(this.voices)
      const audio = await this.client.createSpeech({ text: text.trim(), voice })
      return stageOk({ audio, voice })
    } catch (err) {
      const message = errorMessage(err)
      console.error(`[tts] Error generating speech${voice ? ` with voice ${voice}` : ''}: ${message}`)
      return stageFail({ stage: 'synthesis', message })
    }
  }
}
