/**
 * Speech Client Interface and backend selection
 */

import type { PipelineConfig } from '../../shared/types'
import { FatalSetupError } from '../errors'
import type { EncoderInvoker } from '../media-encoder'
import { OpenAISpeechClient } from './openai-speech'
import { ToneSpeechClient } from './tone-speech'

export interface SpeechRequest {
  text: string
  voice: string
}

/**
 * Text + voice in, encoded audio bytes out. Rejects on any service error.
 */
export interface SpeechClient {
  createSpeech(request: SpeechRequest): Promise<Buffer>
}

/**
 * Throws when the configured backend needs a credential that is missing
 */
export function assertSynthesisCredential(config: Pick<PipelineConfig, 'synthesis'>): void {
  if (config.synthesis.backend === 'openai' && !config.synthesis.apiKey) {
    throw new FatalSetupError('MISSING_CREDENTIAL', 'OPENAI_API_KEY environment variable not set')
  }
}

/**
 * Get speech client instance based on configuration
 * Controlled by TTS_BACKEND:
 * - 'openai' (default): OpenAI text-to-speech, needs OPENAI_API_KEY
 * - 'tone': sine tone per chunk, no service needed
 */
export function createSpeechClient(
  config: Pick<PipelineConfig, 'synthesis' | 'tempRoot'>,
  invoke: EncoderInvoker
): SpeechClient {
  if (config.synthesis.backend === 'tone') {
    console.log('[tts] Using ToneSpeechClient')
    return new ToneSpeechClient(invoke, config.tempRoot)
  }

  assertSynthesisCredential(config)
  console.log(`[tts] Using OpenAISpeechClient (model ${config.synthesis.model})`)
  return new OpenAISpeechClient(config.synthesis)
}
