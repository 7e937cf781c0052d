import yargs from 'yargs'
import { loadConfig, type Env } from '../config'
import { FatalSetupError } from '../errors'
import { cancelAllJobs } from '../ffmpeg-runner'
import { PipelineOrchestrator, type PipelineDeps } from '../orchestrator'

export const NARRATE_USAGE = 'Usage: narrated-clips <input_file> [suffix]'

/**
 * narrated-clips <input_file> [suffix]
 * Resolves to the process exit code.
 */
export async function runNarrate(
  argv: string[],
  env: Env = process.env,
  deps: Partial<PipelineDeps> = {}
): Promise<number> {
  const args = await yargs(argv)
    .scriptName('narrated-clips')
    .usage(`${NARRATE_USAGE}\n\nExample: narrated-clips interview.txt day1_`)
    .parserConfiguration({ 'parse-positional-numbers': false })
    .option('speaker', { type: 'string', describe: 'Speaker tag to narrate, e.g. [Me]' })
    .option('min-length', { type: 'number', describe: 'Minimum paragraph and chunk length in characters' })
    .option('speed', { type: 'number', describe: 'Playback tempo, 0.5 to 2.0' })
    .option('output-dir', { type: 'string', describe: 'Directory for clips and the combined video' })
    .exitProcess(false)
    .parse()

  const [inputArg, suffixArg] = args._
  if (inputArg === undefined) {
    console.log(NARRATE_USAGE)
    return 1
  }

  try {
    const config = loadConfig(env, {
      processSpeaker: args.speaker,
      minSentenceLength: args['min-length'],
      speed: args.speed,
      outputDir: args['output-dir']
    })

    const orchestrator = new PipelineOrchestrator(config, deps)
    const onInterrupt = (): void => {
      console.warn('[pipeline] Interrupted; cancelling running encoder jobs')
      cancelAllJobs()
      process.exit(130)
    }
    process.once('SIGINT', onInterrupt)

    try {
      const report = await orchestrator.run(String(inputArg), suffixArg === undefined ? '' : String(suffixArg))
      if (report.failures.length > 0) {
        console.log(`[pipeline] ${report.failures.length} chunk(s) skipped: ${report.failures.map((f) => f.index).join(', ')}`)
      }
      if (report.outputPath) {
        console.log(`[pipeline] Combined video: ${report.outputPath}`)
      }
      return 0
    } finally {
      process.removeListener('SIGINT', onInterrupt)
    }
  } catch (err) {
    if (err instanceof FatalSetupError) {
      console.error(`Error: ${err.message}`)
      return 1
    }
    throw err
  }
}
