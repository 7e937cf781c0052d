/**
 * Transcript-to-clips pipeline
 *
 * Init -> Parsing -> PerChunkProcessing -> Assembling -> Finalizing -> Done
 *
 * A chunk that fails at any stage is logged and skipped (PartialFailure) and
 * the run carries on; only setup problems abort a run. Work is strictly
 * sequential: each chunk finishes synthesis and post-processing before the
 * next starts, and assembly starts after every chunk was attempted.
 */

import * as fs from 'fs'
import * as path from 'path'
import type {
  ChunkFailure,
  PipelineConfig,
  ReviewCard,
  RunReport,
  SentenceChunk,
  StageResult
} from '../shared/types'
import { stageFail } from '../shared/types'
import { AudioPostProcessor } from './audio-postprocess'
import { formatFileName } from './config'
import { errorMessage, FatalSetupError } from './errors'
import { FrameRenderer, SharpRasterizer, type FrameRasterizer } from './frame-render'
import { ClipManifest } from './manifest'
import { createEncoder, type EncoderInvoker } from './media-encoder'
import { prepareOutputDirectory } from './output-dir'
import { validateInputPath } from './path-validation'
import { extractParagraphs, segmentParagraphs } from './segmentation'
import { assertSynthesisCredential, createSpeechClient, type SpeechClient } from './tts/speech-client'
import { RandomVoiceSelector, SpeechSynthesizer, type VoiceSelector } from './tts/speech-synthesizer'
import { cleanupRunWorkDir, createRunWorkDir, type RunWorkDir } from './work-dir'

export type PipelineState =
  | 'Init'
  | 'Parsing'
  | 'PerChunkProcessing'
  | 'PartialFailure'
  | 'Assembling'
  | 'Finalizing'
  | 'Done'

export interface PipelineDeps {
  invoke: EncoderInvoker
  voiceSelector: VoiceSelector
  rasterizer: FrameRasterizer
  // Built from config on first use when not supplied
  speech?: SpeechClient
  // Fixed run id for the work directory; a uuid otherwise
  runId?: string
}

const PREVIEW_CHARS = 50

function preview(text: string): string {
  return text.length > PREVIEW_CHARS ? `${text.substring(0, PREVIEW_CHARS)}...` : text
}

// Error message of a failed write, null when it went through
function attempt(write: () => void): string | null {
  try {
    write()
    return null
  } catch (err) {
    return errorMessage(err)
  }
}

export class PipelineOrchestrator {
  private config: PipelineConfig
  private deps: PipelineDeps
  private state: PipelineState = 'Init'
  private reviewCards: ReviewCard[] = []

  constructor(config: PipelineConfig, deps: Partial<PipelineDeps> = {}) {
    this.config = config
    this.deps = {
      invoke: deps.invoke ?? createEncoder(config),
      voiceSelector: deps.voiceSelector ?? new RandomVoiceSelector(),
      rasterizer: deps.rasterizer ?? new SharpRasterizer(),
      speech: deps.speech,
      runId: deps.runId
    }
  }

  get currentState(): PipelineState {
    return this.state
  }

  private transition(next: PipelineState): void {
    if (this.state === next) return
    console.log(`[pipeline] ${this.state} -> ${next}`)
    this.state = next
  }

  private speechClient(): SpeechClient {
    if (!this.deps.speech) {
      this.deps.speech = createSpeechClient(this.config, this.deps.invoke)
    }
    return this.deps.speech
  }

  /**
   * Run the whole pipeline for one transcript.
   *
   * Throws FatalSetupError for a missing or unreadable input, a missing
   * credential, a transcript without any speaker tag or an output directory
   * that cannot be created. Everything else is reported in the returned
   * RunReport.
   *
   * The output directory is only touched once at least one review card
   * exists. If the configured output path is a file, that file is deleted
   * and replaced by a directory.
   */
  async run(inputPath: string, suffix: string = ''): Promise<RunReport> {
    const { config } = this
    this.state = 'Init'
    this.reviewCards = []
    const failures: ChunkFailure[] = []

    const input = validateInputPath(inputPath)
    if (!input.ok) {
      const code = input.reason === 'NOT_FOUND'
        ? 'INPUT_NOT_FOUND'
        : input.reason === 'NOT_FILE' ? 'INPUT_NOT_FILE' : 'INPUT_NOT_READABLE'
      throw new FatalSetupError(code, input.message)
    }
    assertSynthesisCredential(config)

    this.transition('Parsing')
    const transcript = fs.readFileSync(input.path, 'utf-8')
    const paragraphs = extractParagraphs(transcript)
    if (paragraphs.length === 0) {
      throw new FatalSetupError('EMPTY_TRANSCRIPT', `No speaker-tagged paragraphs found in '${inputPath}'.`)
    }

    const chunks = segmentParagraphs(paragraphs, config)
    console.log(`[pipeline] ${paragraphs.length} paragraph(s), ${chunks.length} chunk(s) for speaker ${config.processSpeaker}`)

    const report: RunReport = {
      status: 'no-review-cards',
      chunkCount: chunks.length,
      reviewCards: this.reviewCards,
      failures,
      clips: [],
      manifestPath: null,
      outputPath: null,
      assemblyWarning: null
    }

    if (chunks.length === 0) {
      return this.finishWithoutCards(report)
    }

    const workDir = createRunWorkDir(config, this.deps.runId)
    const synthesizer = new SpeechSynthesizer(this.speechClient(), config.voices)
    const postProcessor = new AudioPostProcessor(this.deps.invoke, {
      sourcePath: workDir.tempAudioPath,
      silencePath: workDir.silencePath
    })

    this.transition('PerChunkProcessing')
    for (let index = 0; index < chunks.length; index++) {
      const chunk = chunks[index]
      this.transition('PerChunkProcessing')
      console.log(`[pipeline] Chunk ${index + 1}/${chunks.length}: "${preview(chunk.text)}"`)

      const result = await this.processChunk(chunk, index, workDir, synthesizer, postProcessor)
      if (result.ok) {
        this.reviewCards.push({ index, audioPath: result.value, text: chunk.text })
        continue
      }

      failures.push({ index, text: chunk.text, error: result.error })
      this.transition('PartialFailure')
      console.error(`[pipeline] Skipping chunk ${index} (${result.error.stage}): ${result.error.message}`)
    }

    if (this.reviewCards.length === 0) {
      cleanupRunWorkDir(workDir, [workDir.tempAudioPath, workDir.silencePath], config.preserveTempFiles)
      return this.finishWithoutCards(report)
    }

    await this.assemble(report, workDir, suffix)
    return report
  }

  private finishWithoutCards(report: RunReport): RunReport {
    console.log('[pipeline] No review cards were created. Check your input file and speaker configuration.')
    this.transition('Done')
    return report
  }

  /**
   * synthesize -> shared temp audio -> pad with silence into part_<index>
   */
  private async processChunk(
    chunk: SentenceChunk,
    index: number,
    workDir: RunWorkDir,
    synthesizer: SpeechSynthesizer,
    postProcessor: AudioPostProcessor
  ): Promise<StageResult<string>> {
    const audioPath = workDir.chunkAudioPath(index)
    console.log(`[pipeline] creating ${path.basename(audioPath)}`)

    const speech = await synthesizer.synthesize(chunk.text, this.deps.voiceSelector)
    if (!speech.ok) {
      return speech
    }

    try {
      fs.writeFileSync(workDir.tempAudioPath, speech.value.audio)
    } catch (err) {
      return stageFail({ stage: 'synthesis', message: `write synthesized audio: ${errorMessage(err)}` })
    }

    return postProcessor.padWithSilence(audioPath, this.config.speed)
  }

  private async assemble(report: RunReport, workDir: RunWorkDir, suffix: string): Promise<void> {
    const { config } = this
    const { invoke } = this.deps

    this.transition('Assembling')
    try {
      prepareOutputDirectory(config.outputDir)
    } catch (err) {
      throw new FatalSetupError(
        'OUTPUT_NOT_WRITABLE',
        `Cannot prepare output directory '${config.outputDir}': ${errorMessage(err)}`
      )
    }

    // A clip list that cannot be written only costs the combined video
    const manifest = new ClipManifest(path.join(config.outputDir, config.files.manifest))
    let manifestError = attempt(() => manifest.start())
    if (manifestError === null) {
      report.manifestPath = manifest.path
    }

    const renderer = new FrameRenderer(invoke, this.deps.rasterizer, config.video)
    const finishedAudio: string[] = []

    for (const card of this.reviewCards) {
      const clipName = `${suffix}${formatFileName(config.files.clip, card.index)}`
      const clipPath = path.join(config.outputDir, clipName)
      console.log(`[render] ${clipName}: "${preview(card.text)}"`)

      const rendered = await renderer.renderClip(card.text, card.audioPath, clipPath, workDir.framePath(card.index))
      if (!rendered.ok) {
        report.failures.push({ index: card.index, text: card.text, error: rendered.error })
        this.transition('PartialFailure')
        console.error(`[render] Skipping ${clipName}: ${rendered.error.message}`)
        continue
      }

      report.clips.push(clipName)
      finishedAudio.push(card.audioPath)
      if (manifestError === null) {
        manifestError = attempt(() => manifest.append(clipName))
      }
    }

    this.transition('Finalizing')
    const outputPath = path.join(config.outputDir, `${suffix}${config.files.combined}`)

    if (manifestError !== null) {
      report.assemblyWarning = `Error writing clip list: ${manifestError}`
    } else if (report.clips.length === 0) {
      report.assemblyWarning = 'No clips were rendered; nothing to combine'
    } else {
      const combined = await invoke({ op: 'concat', listFile: manifest.path, output: outputPath })
      if (combined.success) {
        report.outputPath = outputPath
      } else {
        report.assemblyWarning = `Error combining videos: ${combined.error.message}`
      }
    }

    if (report.assemblyWarning) {
      console.warn(`[pipeline] WARNING: ${report.assemblyWarning}. Rendered clips are kept in ${config.outputDir}`)
    }

    cleanupRunWorkDir(
      workDir,
      [...finishedAudio, workDir.silencePath, workDir.tempAudioPath],
      config.preserveTempFiles
    )

    report.status = 'completed'
    this.transition('Done')
    console.log(`[pipeline] Processing complete! Created ${report.clips.length} video clips.`)
  }
}
