export * from '../shared/types'
export { loadConfig, formatFileName, DEFAULT_VOICES, DEFAULT_FILE_NAMES, type ConfigOverrides, type Env } from './config'
export { FatalSetupError, ConfigError, type FatalSetupCode } from './errors'
export { extractParagraphs, splitIntoChunks, selectParagraphs, segmentParagraphs } from './segmentation'
export { createEncoder, probeDuration, buildEncoderCommand, type EncoderInvoker, type EncoderOperation } from './media-encoder'
export { runTool, cancelAllJobs, ToolErrorType, type ToolError, type ToolResult } from './ffmpeg-runner'
export { SpeechSynthesizer, RandomVoiceSelector, type VoiceSelector } from './tts/speech-synthesizer'
export { createSpeechClient, type SpeechClient, type SpeechRequest } from './tts/speech-client'
export { AudioPostProcessor, silenceDurationFor } from './audio-postprocess'
export { FrameRenderer, SharpRasterizer, wrapCaption, buildCaptionSvg, type FrameRasterizer } from './frame-render'
export { ClipManifest, parseManifest } from './manifest'
export { PipelineOrchestrator, type PipelineDeps, type PipelineState } from './orchestrator'
export { WhisperCppTranscriber, formatTranscription, resolveModelSize, type Transcriber } from './asr/whisper-transcriber'
