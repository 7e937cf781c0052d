import fetch from 'node-fetch'
import type { SynthesisSettings } from '../../shared/types'
import type { SpeechClient, SpeechRequest } from './speech-client'

/**
 * Detect audio type from Content-Type header or payload bytes
 */
export function detectAudioType(contentType: string | null, buffer: Buffer): 'mp3' | 'wav' | 'unknown' {
  if (contentType) {
    if (contentType.includes('audio/mpeg') || contentType.includes('audio/mp3')) {
      return 'mp3'
    }
    if (contentType.includes('audio/wav') || contentType.includes('audio/wave')) {
      return 'wav'
    }
  }

  // MP3: ID3 tag or frame sync
  if (buffer.length >= 3) {
    if (buffer[0] === 0x49 && buffer[1] === 0x44 && buffer[2] === 0x33) {
      return 'mp3'
    }
    if (buffer[0] === 0xFF && (buffer[1] & 0xE0) === 0xE0) {
      return 'mp3'
    }
  }

  // WAV: RIFF....WAVE
  if (buffer.length >= 12) {
    const riff = buffer.subarray(0, 4).toString('ascii')
    const wave = buffer.subarray(8, 12).toString('ascii')
    if (riff === 'RIFF' && wave === 'WAVE') {
      return 'wav'
    }
  }

  return 'unknown'
}

/**
 * OpenAI text-to-speech (`POST /audio/speech`), mp3 output
 */
export class OpenAISpeechClient implements SpeechClient {
  private settings: Readonly<SynthesisSettings>

  constructor(settings: Readonly<SynthesisSettings>) {
    this.settings = settings
  }

  async createSpeech(request: SpeechRequest): Promise<Buffer> {
    const { apiKey, baseUrl, model, timeoutMs } = this.settings
    if (!apiKey) throw new Error('OPENAI_API_KEY is not set')

    const apiUrl = `${baseUrl}/audio/speech`
    console.log(`[tts] POST ${apiUrl} voice=${request.voice} chars=${request.text.length}`)

    const res = await fetch(apiUrl, {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${apiKey}`,
        'Content-Type': 'application/json'
      },
      body: JSON.stringify({
        model,
        voice: request.voice,
        input: request.text,
        response_format: 'mp3'
      }),
      timeout: timeoutMs
    })

    if (!res.ok) {
      const err = await res.text()
      throw new Error(`OpenAI speech failed: ${res.status} ${err.slice(0, 200)}`)
    }

    const buffer = Buffer.from(await res.arrayBuffer())
    if (buffer.length === 0) {
      throw new Error('OpenAI speech returned an empty body')
    }

    const detectedType = detectAudioType(res.headers.get('content-type'), buffer)
    if (detectedType !== 'mp3') {
      console.warn(`[tts] Expected mp3 audio, got ${detectedType} (${buffer.length} bytes)`)
    }

    return buffer
  }
}
