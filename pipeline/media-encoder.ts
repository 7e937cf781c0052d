/**
 * Media Encoder - typed ffmpeg/ffprobe invocations
 *
 * Every encoder call is an EncoderOperation value. Commands are built as
 * argument arrays, never shell strings, and the invoker resolves to a tagged
 * result instead of throwing.
 */

import type { AudioSettings, EncoderSettings, PipelineStage, StageError } from '../shared/types'
import { runTool, stderrTail, ToolErrorType, type RunToolOptions, type ToolError, type ToolResult } from './ffmpeg-runner'

export type EncoderOperation =
  | { op: 'probe-duration'; input: string }
  | { op: 'generate-silence'; output: string; durationSec: number }
  | { op: 'generate-tone'; output: string; durationSec: number; frequency: number }
  | { op: 'retime'; input: string; output: string; tempo: number }
  | { op: 'concat'; listFile: string; output: string }
  | { op: 'mux-still'; image: string; audio: string; output: string; durationSec: number; fps: number }
  | { op: 'extract-speech-audio'; input: string; output: string }

export type EncoderResult =
  | { success: true; output: string; stdout: string }
  | { success: false; error: ToolError }

export type EncoderInvoker = (operation: EncoderOperation) => Promise<EncoderResult>

export type DurationResult =
  | { success: true; durationSec: number }
  | { success: false; error: ToolError }

export interface EncoderCommand {
  command: string
  args: string[]
}

export type EncoderConfig = {
  encoder: Readonly<EncoderSettings>
  audio: Readonly<AudioSettings>
}

// Whisper-family models expect 16 kHz mono PCM
const SPEECH_SAMPLE_RATE = 16000

export function formatSeconds(seconds: number): string {
  return seconds.toFixed(3)
}

function channelLayout(channels: number): string {
  return channels === 1 ? 'mono' : 'stereo'
}

/**
 * Build the command for one operation. Pure; no I/O.
 */
export function buildEncoderCommand(operation: EncoderOperation, config: EncoderConfig): EncoderCommand {
  const { ffmpegPath, ffprobePath } = config.encoder
  const sampleRate = String(config.audio.sampleRate)
  const channels = String(config.audio.channels)

  switch (operation.op) {
    case 'probe-duration':
      return {
        command: ffprobePath,
        args: [
          '-v', 'error',
          '-show_entries', 'format=duration',
          '-of', 'default=noprint_wrappers=1:nokey=1',
          operation.input
        ]
      }

    case 'generate-silence':
      return {
        command: ffmpegPath,
        args: [
          '-y',
          '-f', 'lavfi',
          '-i', `anullsrc=r=${sampleRate}:cl=${channelLayout(config.audio.channels)}`,
          '-t', formatSeconds(operation.durationSec),
          operation.output
        ]
      }

    case 'generate-tone':
      return {
        command: ffmpegPath,
        args: [
          '-y',
          '-f', 'lavfi',
          '-i', `sine=frequency=${operation.frequency}:sample_rate=${sampleRate}:duration=${formatSeconds(operation.durationSec)}`,
          '-ac', channels,
          operation.output
        ]
      }

    case 'retime':
      return {
        command: ffmpegPath,
        args: [
          '-y',
          '-i', operation.input,
          '-filter:a', `atempo=${operation.tempo}`,
          '-vn',
          '-ar', sampleRate,
          '-ac', channels,
          operation.output
        ]
      }

    case 'concat':
      return {
        command: ffmpegPath,
        args: [
          '-y',
          '-f', 'concat',
          '-safe', '0',
          '-i', operation.listFile,
          '-c', 'copy',
          operation.output
        ]
      }

    case 'mux-still':
      return {
        command: ffmpegPath,
        args: [
          '-y',
          '-loop', '1',
          '-framerate', String(operation.fps),
          '-i', operation.image,
          '-i', operation.audio,
          '-t', formatSeconds(operation.durationSec),
          '-r', String(operation.fps),
          '-c:v', 'libx264',
          '-tune', 'stillimage',
          '-pix_fmt', 'yuv420p',
          '-c:a', 'aac',
          '-b:a', '192k',
          operation.output
        ]
      }

    case 'extract-speech-audio':
      return {
        command: ffmpegPath,
        args: [
          '-y',
          '-i', operation.input,
          '-vn',
          '-acodec', 'pcm_s16le',
          '-ar', String(SPEECH_SAMPLE_RATE),
          '-ac', '1',
          operation.output
        ]
      }
  }
}

function operationOutput(operation: EncoderOperation): string {
  return operation.op === 'probe-duration' ? operation.input : operation.output
}

export type ToolRunner = (options: RunToolOptions) => Promise<ToolResult>

/**
 * Create the invoker used by every pipeline stage
 */
export function createEncoder(config: EncoderConfig, run: ToolRunner = runTool): EncoderInvoker {
  return async (operation) => {
    const { command, args } = buildEncoderCommand(operation, config)
    const result = await run({ command, args, timeoutMs: config.encoder.timeoutMs })

    if (!result.success) {
      const error: ToolError = result.error ?? {
        type: ToolErrorType.NON_ZERO_EXIT,
        message: `${command} failed`,
        stderr: stderrTail(result.stderr)
      }
      console.error(`[encoder] ${operation.op} failed: ${error.message}`)
      return { success: false, error }
    }

    return { success: true, output: operationOutput(operation), stdout: result.stdout }
  }
}

/**
 * Probe a media file's duration in seconds
 */
export async function probeDuration(invoke: EncoderInvoker, filePath: string): Promise<DurationResult> {
  const result = await invoke({ op: 'probe-duration', input: filePath })
  if (!result.success) {
    return result
  }

  const parsed = parseFloat(result.stdout.trim())
  if (!Number.isFinite(parsed) || parsed < 0) {
    return {
      success: false,
      error: {
        type: ToolErrorType.INVALID_OUTPUT,
        message: `ffprobe could not determine duration for ${filePath}. Raw output: ${result.stdout.trim()}`
      }
    }
  }

  return { success: true, durationSec: parsed }
}

/**
 * Quote a path for an ffmpeg concat list line
 */
export function escapeConcatPath(filePath: string): string {
  return `'${filePath.replace(/'/g, `'\\''`)}'`
}

export function concatListContent(entries: readonly string[]): string {
  return entries.map((entry) => `file ${escapeConcatPath(entry)}\n`).join('')
}

/**
 * Convert an encoder failure into the stage error of the step that ran it
 */
export function encoderStageError(stage: PipelineStage, step: string, error: ToolError): StageError {
  return {
    stage,
    message: `${step}: ${error.message}`,
    encoderErrorType: error.type,
    ...(error.exitCode !== undefined ? { exitCode: error.exitCode } : {}),
    ...(error.stderr ? { stderr: error.stderr } : {})
  }
}
