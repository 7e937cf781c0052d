import { describe, it, expect, vi } from 'vitest'
import { ToolErrorType, type RunToolOptions, type ToolResult } from '../ffmpeg-runner'
import {
  buildEncoderCommand,
  concatListContent,
  createEncoder,
  encoderStageError,
  escapeConcatPath,
  formatSeconds,
  probeDuration,
  type EncoderConfig,
  type EncoderInvoker
} from '../media-encoder'

const config: EncoderConfig = {
  encoder: { ffmpegPath: 'ffmpeg', ffprobePath: 'ffprobe', timeoutMs: 300000 },
  audio: { sampleRate: 44100, channels: 1 }
}

describe('buildEncoderCommand', () => {
  it('probes duration with ffprobe', () => {
    expect(buildEncoderCommand({ op: 'probe-duration', input: '/w/temp.mp3' }, config)).toEqual({
      command: 'ffprobe',
      args: ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', '/w/temp.mp3']
    })
  })

  it('generates silence at the normalized rate and layout', () => {
    const { command, args } = buildEncoderCommand(
      { op: 'generate-silence', output: '/w/silence.mp3', durationSec: 4 },
      config
    )
    expect(command).toBe('ffmpeg')
    expect(args).toEqual(['-y', '-f', 'lavfi', '-i', 'anullsrc=r=44100:cl=mono', '-t', '4.000', '/w/silence.mp3'])
  })

  it('uses a stereo layout for two channels', () => {
    const { args } = buildEncoderCommand(
      { op: 'generate-silence', output: 's.mp3', durationSec: 1.25 },
      { ...config, audio: { sampleRate: 48000, channels: 2 } }
    )
    expect(args[4]).toBe('anullsrc=r=48000:cl=stereo')
    expect(args[6]).toBe('1.250')
  })

  it('generates a sine tone', () => {
    const { args } = buildEncoderCommand(
      { op: 'generate-tone', output: 't.mp3', durationSec: 2, frequency: 440 },
      config
    )
    expect(args).toEqual(['-y', '-f', 'lavfi', '-i', 'sine=frequency=440:sample_rate=44100:duration=2.000', '-ac', '1', 't.mp3'])
  })

  it('retimes and normalizes audio', () => {
    const { args } = buildEncoderCommand(
      { op: 'retime', input: 'temp.mp3', output: 'part_0.mp3', tempo: 1.25 },
      config
    )
    expect(args).toEqual(['-y', '-i', 'temp.mp3', '-filter:a', 'atempo=1.25', '-vn', '-ar', '44100', '-ac', '1', 'part_0.mp3'])
  })

  it('concatenates a list file with stream copy', () => {
    const { args } = buildEncoderCommand({ op: 'concat', listFile: 'list.txt', output: 'ALL.mp4' }, config)
    expect(args).toEqual(['-y', '-f', 'concat', '-safe', '0', '-i', 'list.txt', '-c', 'copy', 'ALL.mp4'])
  })

  it('muxes a looped still with audio at a fixed frame rate', () => {
    const { args } = buildEncoderCommand(
      { op: 'mux-still', image: 'frame.png', audio: 'part_0.mp3', output: 'part_0.mp4', durationSec: 2.9333333, fps: 30 },
      config
    )
    expect(args).toEqual([
      '-y', '-loop', '1', '-framerate', '30', '-i', 'frame.png', '-i', 'part_0.mp3',
      '-t', '2.933', '-r', '30', '-c:v', 'libx264', '-tune', 'stillimage', '-pix_fmt', 'yuv420p',
      '-c:a', 'aac', '-b:a', '192k', 'part_0.mp4'
    ])
  })

  it('extracts 16 kHz mono PCM for speech recognition', () => {
    const { args } = buildEncoderCommand({ op: 'extract-speech-audio', input: 'in.m4a', output: 'out.wav' }, config)
    expect(args).toEqual(['-y', '-i', 'in.m4a', '-vn', '-acodec', 'pcm_s16le', '-ar', '16000', '-ac', '1', 'out.wav'])
  })
})

describe('formatSeconds', () => {
  it('keeps millisecond precision', () => {
    expect(formatSeconds(1)).toBe('1.000')
    expect(formatSeconds(0.0666666)).toBe('0.067')
  })
})

describe('createEncoder', () => {
  it('runs the built command with the configured timeout', async () => {
    const run = vi.fn(async (_options: RunToolOptions): Promise<ToolResult> => ({
      success: true, exitCode: 0, stdout: '', stderr: ''
    }))
    const invoke = createEncoder(config, run)

    const result = await invoke({ op: 'concat', listFile: 'list.txt', output: 'out.mp4' })

    expect(result).toEqual({ success: true, output: 'out.mp4', stdout: '' })
    expect(run).toHaveBeenCalledWith({
      command: 'ffmpeg',
      args: ['-y', '-f', 'concat', '-safe', '0', '-i', 'list.txt', '-c', 'copy', 'out.mp4'],
      timeoutMs: 300000
    })
  })

  it('reports the probed file as the output of a probe', async () => {
    const invoke = createEncoder(config, async () => ({ success: true, exitCode: 0, stdout: '3.5\n', stderr: '' }))

    const result = await invoke({ op: 'probe-duration', input: 'a.mp3' })

    expect(result).toEqual({ success: true, output: 'a.mp3', stdout: '3.5\n' })
  })

  it('passes the runner error through', async () => {
    const error = { type: ToolErrorType.NON_ZERO_EXIT, message: 'ffmpeg exited with code 1', exitCode: 1, stderr: 'bad' }
    const invoke = createEncoder(config, async () => ({ success: false, exitCode: 1, stdout: '', stderr: 'bad', error }))
    vi.spyOn(console, 'error').mockImplementation(() => {})

    const result = await invoke({ op: 'retime', input: 'a', output: 'b', tempo: 1 })

    expect(result).toEqual({ success: false, error })
  })

  it('fills in an error when the runner gives none', async () => {
    const invoke = createEncoder(config, async () => ({ success: false, exitCode: 1, stdout: '', stderr: 'oops' }))
    vi.spyOn(console, 'error').mockImplementation(() => {})

    const result = await invoke({ op: 'retime', input: 'a', output: 'b', tempo: 1 })

    expect(result).toEqual({
      success: false,
      error: { type: ToolErrorType.NON_ZERO_EXIT, message: 'ffmpeg failed', stderr: 'oops' }
    })
  })
})

describe('probeDuration', () => {
  const probeReturning = (stdout: string): EncoderInvoker =>
    async (operation) => ({ success: true, output: operation.op === 'probe-duration' ? operation.input : '', stdout })

  it('parses the reported seconds', async () => {
    expect(await probeDuration(probeReturning('12.5\n'), 'a.mp3')).toEqual({ success: true, durationSec: 12.5 })
  })

  it('rejects output that is not a duration', async () => {
    const result = await probeDuration(probeReturning('N/A\n'), 'a.mp3')

    expect(result).toEqual({
      success: false,
      error: {
        type: ToolErrorType.INVALID_OUTPUT,
        message: 'ffprobe could not determine duration for a.mp3. Raw output: N/A'
      }
    })
  })

  it('returns the encoder error when the probe fails', async () => {
    const error = { type: ToolErrorType.SPAWN_FAILED, message: 'Failed to spawn ffprobe: ENOENT' }
    const result = await probeDuration(async () => ({ success: false, error }), 'a.mp3')
    expect(result).toEqual({ success: false, error })
  })
})

describe('concat lists', () => {
  it('quotes paths and escapes single quotes', () => {
    expect(escapeConcatPath('/tmp/plain.mp3')).toBe(`'/tmp/plain.mp3'`)
    expect(escapeConcatPath(`/tmp/it's.mp3`)).toBe(`'/tmp/it'\\''s.mp3'`)
  })

  it('writes one file line per entry', () => {
    expect(concatListContent(['a.mp4', 'b.mp4'])).toBe(`file 'a.mp4'\nfile 'b.mp4'\n`)
  })
})

describe('encoderStageError', () => {
  it('names the failed step and keeps the encoder details', () => {
    const error = encoderStageError('render', 'mux clip', {
      type: ToolErrorType.NON_ZERO_EXIT,
      message: 'ffmpeg exited with code 1',
      exitCode: 1,
      stderr: 'tail'
    })

    expect(error).toEqual({
      stage: 'render',
      message: 'mux clip: ffmpeg exited with code 1',
      encoderErrorType: 'non_zero_exit',
      exitCode: 1,
      stderr: 'tail'
    })
  })

  it('omits details the encoder did not report', () => {
    const error = encoderStageError('postprocess', 'apply tempo', { type: ToolErrorType.TIMEOUT, message: 'ffmpeg timed out after 300s' })
    expect(error).toEqual({
      stage: 'postprocess',
      message: 'apply tempo: ffmpeg timed out after 300s',
      encoderErrorType: 'timeout'
    })
  })
})
