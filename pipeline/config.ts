/**
 * Pipeline configuration
 *
 * Built once per run from defaults, environment variables and CLI overrides,
 * then frozen. Components receive the config explicitly; nothing below
 * loadConfig reads process.env.
 */

import * as os from 'os'
import * as path from 'path'
import type { FileNameTemplates, PipelineConfig, SynthesisBackend } from '../shared/types'
import { ConfigError } from './errors'

export type Env = Record<string, string | undefined>

export interface ConfigOverrides {
  processSpeaker?: string
  minSentenceLength?: number
  speed?: number
  outputDir?: string
}

export const DEFAULT_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const

export const DEFAULT_FILE_NAMES: FileNameTemplates = {
  tempAudio: 'temp.mp3',
  silence: 'silence.mp3',
  chunkAudio: 'part_{index}.mp3',
  clip: 'part_{index}.mp4',
  manifest: 'output_files.txt',
  combined: 'ALL.mp4'
}

// atempo keeps speech natural inside this range
const MIN_SPEED = 0.5
const MAX_SPEED = 2.0

const SYNTHESIS_BACKENDS: readonly SynthesisBackend[] = ['openai', 'tone']

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return fallback
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new ConfigError(key, `expected a number, got "${raw}"`)
  }
  return value
}

function readString(env: Env, key: string, fallback: string): string {
  const raw = env[key]
  return raw === undefined || raw.trim() === '' ? fallback : raw.trim()
}

function readList(env: Env, key: string, fallback: readonly string[]): string[] {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return [...fallback]
  return raw.split(',').map((v) => v.trim()).filter(Boolean)
}

function readBackend(env: Env): SynthesisBackend {
  const raw = readString(env, 'TTS_BACKEND', 'openai')
  const backend = SYNTHESIS_BACKENDS.find((b) => b === raw)
  if (!backend) {
    throw new ConfigError('TTS_BACKEND', `expected one of ${SYNTHESIS_BACKENDS.join(', ')}, got "${raw}"`)
  }
  return backend
}

function requirePositiveInteger(field: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(field, `expected a positive integer, got ${value}`)
  }
  return value
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key)
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child)
    }
  }
  return Object.freeze(value)
}

/**
 * Build and validate the immutable pipeline configuration.
 * The credential is read here but only required when a run starts.
 */
export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): PipelineConfig {
  const speed = overrides.speed ?? readNumber(env, 'TTS_SPEED', 1.0)
  if (!(speed >= MIN_SPEED && speed <= MAX_SPEED)) {
    throw new ConfigError('TTS_SPEED', `expected a value between ${MIN_SPEED} and ${MAX_SPEED}, got ${speed}`)
  }

  const voices = readList(env, 'TTS_VOICES', DEFAULT_VOICES)
  if (voices.length === 0) {
    throw new ConfigError('TTS_VOICES', 'at least one voice is required')
  }

  const processSpeaker = overrides.processSpeaker ?? readString(env, 'PROCESS_SPEAKER', '[Me]')
  if (!/^[A-Za-z[\]]+$/.test(processSpeaker)) {
    throw new ConfigError('PROCESS_SPEAKER', `"${processSpeaker}" can never match a speaker tag`)
  }

  const apiKey = env.OPENAI_API_KEY?.trim()

  const config: PipelineConfig = {
    processSpeaker,
    minSentenceLength: requirePositiveInteger(
      'MIN_SENTENCE_LENGTH',
      overrides.minSentenceLength ?? readNumber(env, 'MIN_SENTENCE_LENGTH', 30)
    ),
    speed,
    voices,
    outputDir: path.resolve(overrides.outputDir ?? readString(env, 'OUTPUT_DIR', 'output')),
    tempRoot: path.resolve(readString(env, 'TEMP_ROOT', path.join(os.tmpdir(), 'narrated-clips'))),
    preserveTempFiles: readString(env, 'PRESERVE_TEMP_FILES', 'false').toLowerCase() === 'true',
    video: {
      width: requirePositiveInteger('VIDEO_WIDTH', readNumber(env, 'VIDEO_WIDTH', 640)),
      height: requirePositiveInteger('VIDEO_HEIGHT', readNumber(env, 'VIDEO_HEIGHT', 480)),
      fps: requirePositiveInteger('VIDEO_FPS', readNumber(env, 'VIDEO_FPS', 30)),
      fontSize: requirePositiveInteger('FONT_SIZE', readNumber(env, 'FONT_SIZE', 32)),
      fontFamily: readString(env, 'FONT_FAMILY', 'Arial'),
      textWrapWidth: requirePositiveInteger('TEXT_WRAP_WIDTH', readNumber(env, 'TEXT_WRAP_WIDTH', 40))
    },
    audio: {
      sampleRate: 44100,
      channels: 1
    },
    synthesis: {
      backend: readBackend(env),
      apiKey: apiKey ? apiKey : null,
      baseUrl: readString(env, 'OPENAI_BASE_URL', 'https://api.openai.com/v1').replace(/\/+$/, ''),
      model: readString(env, 'TTS_MODEL', 'tts-1'),
      timeoutMs: requirePositiveInteger('TTS_TIMEOUT_MS', readNumber(env, 'TTS_TIMEOUT_MS', 60000))
    },
    encoder: {
      ffmpegPath: readString(env, 'FFMPEG_PATH', 'ffmpeg'),
      ffprobePath: readString(env, 'FFPROBE_PATH', 'ffprobe'),
      timeoutMs: requirePositiveInteger('ENCODER_TIMEOUT_MS', readNumber(env, 'ENCODER_TIMEOUT_MS', 5 * 60 * 1000))
    },
    files: { ...DEFAULT_FILE_NAMES }
  }

  return deepFreeze(config)
}

/**
 * Fill `{index}` in a file name template
 */
export function formatFileName(template: string, index: number): string {
  return template.replace(/\{index\}/g, String(index))
}
