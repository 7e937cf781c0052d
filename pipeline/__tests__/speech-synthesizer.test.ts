import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import * as fs from 'fs'
import { loadConfig } from '../config'
import { FatalSetupError } from '../errors'
import { OpenAISpeechClient } from '../tts/openai-speech'
import { assertSynthesisCredential, createSpeechClient } from '../tts/speech-client'
import { RandomVoiceSelector, SpeechSynthesizer } from '../tts/speech-synthesizer'
import { ToneSpeechClient } from '../tts/tone-speech'
import { createFakeEncoder, FakeSpeechClient, firstVoice, makeTempDir, testEnv, toolError } from './helpers/fakes'

const VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer']

describe('RandomVoiceSelector', () => {
  it('maps the random draw onto the set', () => {
    expect(new RandomVoiceSelector(() => 0).pick(VOICES)).toBe('alloy')
    expect(new RandomVoiceSelector(() => 0.5).pick(VOICES)).toBe('onyx')
    expect(new RandomVoiceSelector(() => 0.99).pick(VOICES)).toBe('shimmer')
  })

  it('throws on an empty set', () => {
    expect(() => new RandomVoiceSelector().pick([])).toThrow('Cannot pick from an empty set')
  })
})

describe('SpeechSynthesizer', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('sends trimmed text with the selected voice', async () => {
    const client = new FakeSpeechClient()
    const synthesizer = new SpeechSynthesizer(client, VOICES)

    const result = await synthesizer.synthesize('  Hello there.  ', firstVoice)

    expect(result).toEqual({ ok: true, value: { audio: Buffer.from('Hello there.'), voice: 'alloy' } })
    expect(client.requests).toEqual([{ text: 'Hello there.', voice: 'alloy' }])
  })

  it('turns a client rejection into a synthesis failure', async () => {
    const synthesizer = new SpeechSynthesizer(new FakeSpeechClient(() => true), VOICES)

    const result = await synthesizer.synthesize('Hello.', firstVoice)

    expect(result).toEqual({ ok: false, error: { stage: 'synthesis', message: 'speech service unavailable' } })
  })

  it('turns a voice selection error into a synthesis failure', async () => {
    const synthesizer = new SpeechSynthesizer(new FakeSpeechClient(), [])

    const result = await synthesizer.synthesize('Hello.', new RandomVoiceSelector())

    expect(result).toEqual({ ok: false, error: { stage: 'synthesis', message: 'Cannot pick from an empty set' } })
  })
})

describe('speech client selection', () => {
  let root: string

  beforeEach(() => {
    root = makeTempDir('speech-client-test')
    vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  it('builds the OpenAI client by default', () => {
    const config = loadConfig(testEnv(root))
    expect(createSpeechClient(config, createFakeEncoder().invoke)).toBeInstanceOf(OpenAISpeechClient)
  })

  it('builds the tone client without a credential', () => {
    const config = loadConfig(testEnv(root, { TTS_BACKEND: 'tone', OPENAI_API_KEY: '' }))

    expect(() => assertSynthesisCredential(config)).not.toThrow()
    expect(createSpeechClient(config, createFakeEncoder().invoke)).toBeInstanceOf(ToneSpeechClient)
  })

  it('requires the key for the OpenAI backend', () => {
    const config = loadConfig(testEnv(root, { OPENAI_API_KEY: undefined }))

    expect(() => assertSynthesisCredential(config)).toThrow(FatalSetupError)
    expect(() => createSpeechClient(config, createFakeEncoder().invoke)).toThrow(
      'OPENAI_API_KEY environment variable not set'
    )
  })
})

describe('ToneSpeechClient', () => {
  let scratch: string

  beforeEach(() => {
    scratch = makeTempDir('tone-test')
  })

  afterEach(() => {
    fs.rmSync(scratch, { recursive: true, force: true })
  })

  it('returns the generated tone and removes the scratch file', async () => {
    const { invoke, calls } = createFakeEncoder()
    const client = new ToneSpeechClient(invoke, scratch)

    const audio = await client.createSpeech({ text: 'Hello.', voice: 'alloy' })

    expect(audio.toString()).toBe('fake generate-tone')
    expect(calls).toHaveLength(1)
    const [call] = calls
    expect(call.op).toBe('generate-tone')
    if (call.op === 'generate-tone') {
      expect(call.durationSec).toBe(2)
      expect(call.frequency).toBe(440)
    }
    expect(fs.readdirSync(scratch)).toEqual([])
  })

  it('rejects when the encoder fails', async () => {
    const { invoke } = createFakeEncoder({ fail: () => toolError('no lavfi') })
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const client = new ToneSpeechClient(invoke, scratch)

    await expect(client.createSpeech({ text: 'Hello.', voice: 'alloy' })).rejects.toThrow(
      'Tone generation failed for "Hello.": no lavfi'
    )
    vi.restoreAllMocks()
  })
})
