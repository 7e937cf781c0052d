import * as fs from 'fs'

export type OutputDirState = 'existing' | 'created' | 'replaced'

/**
 * Make sure the output directory exists.
 *
 * WARNING: if the path exists but is not a directory (a file or a symlink to
 * one), it is deleted and a fresh directory is created in its place. Whatever
 * was at that path is lost. An existing directory is reused as is and clips
 * with the same names are overwritten.
 */
export function prepareOutputDirectory(outputDir: string): OutputDirState {
  let stats: fs.Stats
  try {
    stats = fs.statSync(outputDir)
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      fs.mkdirSync(outputDir, { recursive: true })
      console.log(`[pipeline] Created output directory ${outputDir}`)
      return 'created'
    }
    throw err
  }

  if (stats.isDirectory()) {
    return 'existing'
  }

  console.warn(`[pipeline] WARNING: ${outputDir} exists and is not a directory; removing it and creating a fresh output directory`)
  fs.rmSync(outputDir, { force: true, recursive: true })
  fs.mkdirSync(outputDir, { recursive: true })
  return 'replaced'
}
