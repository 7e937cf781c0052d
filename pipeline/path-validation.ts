import * as path from 'path'
import * as fs from 'fs'

/**
 * Path validation failure reasons
 */
export type PathValidationFailure =
  | 'NOT_FOUND'
  | 'NOT_READABLE'
  | 'NOT_FILE'
  | 'UNSUPPORTED_TYPE'

export type PathValidationResult =
  | { ok: true; path: string }
  | { ok: false; reason: PathValidationFailure; message: string }

/**
 * Audio containers the transcription utility accepts
 */
export const SUPPORTED_AUDIO_EXTENSIONS: ReadonlySet<string> = new Set([
  '.wav', '.mp3', '.m4a', '.aac', '.flac', '.ogg', '.opus', '.webm',
  '.mp4', '.mov', '.mkv'
])

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code
  }
  return undefined
}

/**
 * Validate a user-supplied input file path.
 * Checks: existence, is file, readability and, when given, the extension.
 * Relative paths are resolved against the working directory.
 */
export function validateInputPath(
  filePath: string,
  allowedExtensions?: ReadonlySet<string>
): PathValidationResult {
  const resolved = path.resolve(filePath)

  let stats: fs.Stats
  try {
    stats = fs.statSync(resolved)
  } catch (err) {
    const code = errorCode(err)
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return {
        ok: false,
        reason: 'NOT_FOUND',
        message: `Input file '${filePath}' does not exist.`
      }
    }
    if (code === 'EACCES') {
      return {
        ok: false,
        reason: 'NOT_READABLE',
        message: `Permission denied: ${filePath}`
      }
    }
    return {
      ok: false,
      reason: 'NOT_READABLE',
      message: `Cannot access file: ${err instanceof Error ? err.message : String(err)}`
    }
  }

  // Must be a regular file (not directory, socket, etc)
  if (!stats.isFile()) {
    return {
      ok: false,
      reason: 'NOT_FILE',
      message: `Path is not a regular file: ${filePath}`
    }
  }

  try {
    fs.accessSync(resolved, fs.constants.R_OK)
  } catch {
    return {
      ok: false,
      reason: 'NOT_READABLE',
      message: `File is not readable: ${filePath}`
    }
  }

  if (allowedExtensions) {
    const ext = path.extname(resolved).toLowerCase()
    if (!allowedExtensions.has(ext)) {
      return {
        ok: false,
        reason: 'UNSUPPORTED_TYPE',
        message: `Unsupported file type: ${ext || '(none)'}. Supported: ${Array.from(allowedExtensions).join(', ')}`
      }
    }
  }

  return { ok: true, path: resolved }
}
