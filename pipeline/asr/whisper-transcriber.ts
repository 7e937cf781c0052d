/**
 * Whisper.cpp ASR Transcriber
 * Uses the offline whisper.cpp binary; plain text out
 */

import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { runTool, ToolErrorType, type ToolResult } from '../ffmpeg-runner'
import type { EncoderInvoker, ToolRunner } from '../media-encoder'
import type { Env } from '../config'

export const MODEL_SIZES = ['tiny', 'base', 'small', 'medium', 'large'] as const
export type ModelSize = typeof MODEL_SIZES[number]

export const DEFAULT_MODEL_SIZE: ModelSize = 'base'

export interface WhisperCppConfig {
  binPath: string // whisper.cpp CLI binary, path or name on PATH
  modelsDir: string // directory holding ggml-<size>.bin files
  threads: number
  language: string
  timeoutMs: number
}

/**
 * Audio file + model size in, text out
 */
export interface Transcriber {
  transcribe(audioPath: string, modelSize: ModelSize): Promise<string>
}

export function loadWhisperConfig(env: Env = process.env): WhisperCppConfig {
  const threads = Number(env.WHISPER_THREADS || 4)
  return {
    binPath: env.WHISPER_BIN || 'whisper-cli',
    modelsDir: path.resolve(env.WHISPER_MODELS_DIR || 'models'),
    threads: Number.isInteger(threads) && threads > 0 ? threads : 4,
    language: env.WHISPER_LANGUAGE || 'en',
    timeoutMs: 10 * 60 * 1000
  }
}

/**
 * Unknown sizes fall back to `base`
 */
export function resolveModelSize(requested: string): { size: ModelSize; fallback: boolean } {
  const size = MODEL_SIZES.find((s) => s === requested)
  return size ? { size, fallback: false } : { size: DEFAULT_MODEL_SIZE, fallback: true }
}

export function modelPathFor(config: Pick<WhisperCppConfig, 'modelsDir'>, size: ModelSize): string {
  return path.join(config.modelsDir, `ggml-${size}.bin`)
}

/**
 * One sentence per line: a break after every ". ", "? " and "! "
 */
export function formatTranscription(text: string): string {
  return text
    .trim()
    .replace(/\. /g, '.\n')
    .replace(/\? /g, '?\n')
    .replace(/! /g, '!\n')
}

function describeFailure(result: ToolResult): string {
  if (result.error?.type === ToolErrorType.NON_ZERO_EXIT) {
    return `exit ${result.exitCode}: ${result.error.stderr || result.error.message}`
  }
  return result.error?.message ?? 'unknown error'
}

export class WhisperCppTranscriber implements Transcriber {
  private config: WhisperCppConfig
  private invoke: EncoderInvoker
  private run: ToolRunner

  constructor(config: WhisperCppConfig, invoke: EncoderInvoker, run: ToolRunner = runTool) {
    this.config = config
    this.invoke = invoke
    this.run = run
  }

  async transcribe(audioPath: string, modelSize: ModelSize): Promise<string> {
    const modelPath = modelPathFor(this.config, modelSize)
    if (!fs.existsSync(modelPath)) {
      throw new Error(`Whisper model not found at: ${modelPath}`)
    }

    const workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'whisper-'))
    const wavPath = path.join(workDir, 'speech.wav')
    const outputBase = path.join(workDir, 'transcript')

    try {
      // whisper.cpp reads 16 kHz mono PCM only
      const extracted = await this.invoke({ op: 'extract-speech-audio', input: audioPath, output: wavPath })
      if (!extracted.success) {
        throw new Error(`Audio conversion failed: ${extracted.error.message}`)
      }

      const result = await this.run({
        command: this.config.binPath,
        args: [
          '-m', modelPath,
          '-f', wavPath,
          '-l', this.config.language,
          '-t', String(this.config.threads),
          '-otxt',
          '-of', outputBase
        ],
        timeoutMs: this.config.timeoutMs
      })
      if (!result.success) {
        throw new Error(`Whisper.cpp failed (${describeFailure(result)})`)
      }

      const textPath = `${outputBase}.txt`
      if (!fs.existsSync(textPath)) {
        throw new Error(`Whisper output not found at: ${textPath}`)
      }

      return fs.readFileSync(textPath, 'utf8')
    } finally {
      fs.rmSync(workDir, { recursive: true, force: true })
    }
  }
}
