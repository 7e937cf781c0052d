/**
 * Per-run temporary files
 *
 * Each run works inside <tempRoot>/run-<uuid>. Only files the pipeline knows
 * are finished with get deleted; anything a failed chunk left behind stays
 * for diagnosis.
 */

import * as fs from 'fs'
import * as path from 'path'
import { v4 as uuidv4 } from 'uuid'
import type { PipelineConfig } from '../shared/types'
import { formatFileName } from './config'

const RUN_DIR_PREFIX = 'run-'

export interface RunWorkDir {
  runId: string
  dir: string
  // Synthesized bytes land here before post-processing; shared by all chunks
  tempAudioPath: string
  // Silence track, regenerated per chunk
  silencePath: string
  chunkAudioPath: (index: number) => string
  framePath: (index: number) => string
}

export function ensureTempRoot(tempRoot: string): string {
  if (!fs.existsSync(tempRoot)) {
    fs.mkdirSync(tempRoot, { recursive: true })
  }
  return tempRoot
}

export function createRunWorkDir(
  config: Pick<PipelineConfig, 'tempRoot' | 'files'>,
  runId: string = uuidv4()
): RunWorkDir {
  const dir = path.join(ensureTempRoot(config.tempRoot), `${RUN_DIR_PREFIX}${runId}`)
  fs.mkdirSync(dir, { recursive: true })
  console.log(`[work-dir] Created ${dir}`)

  return {
    runId,
    dir,
    tempAudioPath: path.join(dir, config.files.tempAudio),
    silencePath: path.join(dir, config.files.silence),
    chunkAudioPath: (index) => path.join(dir, formatFileName(config.files.chunkAudio, index)),
    framePath: (index) => path.join(dir, `frame_${index}.png`)
  }
}

/**
 * Delete the given files. Missing files are skipped.
 * Returns the paths that were actually removed.
 */
export function removeFiles(filePaths: readonly string[]): string[] {
  const removed: string[] = []
  for (const filePath of filePaths) {
    if (!fs.existsSync(filePath)) continue
    try {
      fs.unlinkSync(filePath)
      removed.push(filePath)
    } catch (err) {
      console.error(`[work-dir] Failed to remove ${filePath}:`, err)
    }
  }
  return removed
}

/**
 * Delete finished temp files and drop the run directory if nothing else is
 * left in it. Returns true when the directory was removed.
 */
export function cleanupRunWorkDir(
  workDir: RunWorkDir,
  finishedFiles: readonly string[],
  preserveTempFiles: boolean
): boolean {
  if (preserveTempFiles) {
    console.log(`[work-dir] PRESERVE_TEMP_FILES set, keeping ${workDir.dir}`)
    return false
  }

  removeFiles(finishedFiles)

  if (!fs.existsSync(workDir.dir)) return false

  const leftovers = fs.readdirSync(workDir.dir)
  if (leftovers.length > 0) {
    console.warn(`[work-dir] Keeping ${workDir.dir} for inspection (${leftovers.length} file(s) left)`)
    return false
  }

  fs.rmdirSync(workDir.dir)
  return true
}
