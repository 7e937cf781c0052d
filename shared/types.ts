/**
 * Shared type definitions for the transcript-to-clips pipeline.
 * Single source of truth - imported by every pipeline stage and the CLI.
 */

/**
 * One speaker-tagged block of the transcript, in document order.
 */
export interface Paragraph {
  readonly speaker: string
  readonly content: string
}

/**
 * Consecutive sentences synthesized as one audio/video unit.
 * `text` is the sentences joined with a single space.
 */
export interface SentenceChunk {
  readonly sentences: readonly string[]
  readonly text: string
}

/**
 * A post-processed audio file paired with the text it narrates.
 * `index` is the chunk index the audio file was named after.
 */
export interface ReviewCard {
  index: number
  audioPath: string
  text: string
}

export type SynthesisBackend = 'openai' | 'tone'

export interface VideoSettings {
  width: number
  height: number
  fps: number
  fontSize: number
  fontFamily: string
  textWrapWidth: number
}

export interface AudioSettings {
  sampleRate: number
  channels: number
}

export interface SynthesisSettings {
  backend: SynthesisBackend
  apiKey: string | null
  baseUrl: string
  model: string
  timeoutMs: number
}

/**
 * File name templates. `{index}` is replaced with the chunk index.
 */
export interface FileNameTemplates {
  tempAudio: string
  silence: string
  chunkAudio: string
  clip: string
  manifest: string
  combined: string
}

export interface EncoderSettings {
  ffmpegPath: string
  ffprobePath: string
  timeoutMs: number
}

/**
 * Immutable configuration snapshot for one pipeline run.
 */
export interface PipelineConfig {
  readonly processSpeaker: string
  readonly minSentenceLength: number
  readonly speed: number
  readonly voices: readonly string[]
  readonly outputDir: string
  readonly tempRoot: string
  readonly preserveTempFiles: boolean
  readonly video: Readonly<VideoSettings>
  readonly audio: Readonly<AudioSettings>
  readonly synthesis: Readonly<SynthesisSettings>
  readonly encoder: Readonly<EncoderSettings>
  readonly files: Readonly<FileNameTemplates>
}

export type PipelineStage = 'synthesis' | 'postprocess' | 'render' | 'assembly'

export interface StageError {
  stage: PipelineStage
  message: string
  encoderErrorType?: string
  exitCode?: number
  stderr?: string
}

/**
 * Tagged result returned at every stage boundary.
 */
export type StageSuccess<T> = { ok: true; value: T }
export type StageFailure = { ok: false; error: StageError }

export type StageResult<T> = StageSuccess<T> | StageFailure

export interface ChunkFailure {
  index: number
  text: string
  error: StageError
}

export type RunStatus = 'completed' | 'no-review-cards'

export interface RunReport {
  status: RunStatus
  chunkCount: number
  reviewCards: ReviewCard[]
  failures: ChunkFailure[]
  clips: string[]
  manifestPath: string | null
  outputPath: string | null
  assemblyWarning: string | null
}

export function stageOk<T>(value: T): StageSuccess<T> {
  return { ok: true, value }
}

export function stageFail(error: StageError): StageFailure {
  return { ok: false, error }
}
