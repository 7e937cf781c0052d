import * as fs from 'fs'
import * as path from 'path'
import yargs from 'yargs'
import {
  formatTranscription,
  loadWhisperConfig,
  resolveModelSize,
  WhisperCppTranscriber,
  type Transcriber
} from '../asr/whisper-transcriber'
import { loadConfig, type Env } from '../config'
import { errorMessage, FatalSetupError } from '../errors'
import { createEncoder } from '../media-encoder'
import { SUPPORTED_AUDIO_EXTENSIONS, validateInputPath } from '../path-validation'

export const TRANSCRIBE_USAGE = 'Usage: transcribe-audio <audio_file_path> <model_size>'

export interface TranscribeDeps {
  transcriber?: Transcriber
  now?: () => number
}

/**
 * transcribe-audio <audio_file_path> <model_size> [--out file]
 * Writes one sentence per line. Resolves to the process exit code.
 */
export async function runTranscribe(
  argv: string[],
  env: Env = process.env,
  deps: TranscribeDeps = {}
): Promise<number> {
  const now = deps.now ?? Date.now
  const args = await yargs(argv)
    .scriptName('transcribe-audio')
    .usage(`${TRANSCRIBE_USAGE}\n\nExample: transcribe-audio audio.wav base`)
    .parserConfiguration({ 'parse-positional-numbers': false })
    .option('out', { type: 'string', default: 'transcription.txt', describe: 'Where to write the text' })
    .exitProcess(false)
    .parse()

  const [audioArg, modelArg] = args._
  if (audioArg === undefined || modelArg === undefined || args._.length > 2) {
    console.log(TRANSCRIBE_USAGE)
    console.log('Example: transcribe-audio audio.wav base')
    return 1
  }

  const input = validateInputPath(String(audioArg), SUPPORTED_AUDIO_EXTENSIONS)
  if (!input.ok) {
    console.error(`Error: ${input.message}`)
    return 1
  }

  const model = resolveModelSize(String(modelArg))
  if (model.fallback) {
    console.log(`Unknown model size '${modelArg}'. Using 'base' model.`)
  }

  let transcriber = deps.transcriber
  if (!transcriber) {
    try {
      transcriber = new WhisperCppTranscriber(loadWhisperConfig(env), createEncoder(loadConfig(env)))
    } catch (err) {
      if (err instanceof FatalSetupError) {
        console.error(`Error: ${err.message}`)
        return 1
      }
      throw err
    }
  }

  try {
    const startedAt = now()
    const text = await transcriber.transcribe(input.path, model.size)
    const elapsedSec = (now() - startedAt) / 1000

    const outPath = path.resolve(args.out)
    fs.writeFileSync(outPath, formatTranscription(text), 'utf-8')

    console.log(`Transcription saved to ${outPath}`)
    console.log(`Elapsed time: ${elapsedSec.toFixed(2)} seconds`)
    return 0
  } catch (err) {
    console.error(`Error transcribing audio: ${errorMessage(err)}`)
    return 1
  }
}
