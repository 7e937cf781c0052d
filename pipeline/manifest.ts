/**
 * Clip manifest
 * Line-oriented concat list driving the final join. Entries are written as
 * soon as a clip exists, so an interrupted run leaves a usable partial list.
 */

import * as fs from 'fs'
import { concatListContent } from './media-encoder'

const ENTRY_PATTERN = /^file '((?:[^']|'\\'')*)'$/

export class ClipManifest {
  readonly path: string
  private names: string[] = []

  constructor(filePath: string) {
    this.path = filePath
  }

  /**
   * Truncate the file; a run never appends to a previous run's list
   */
  start(): void {
    fs.writeFileSync(this.path, '')
    this.names = []
  }

  append(clipName: string): void {
    fs.appendFileSync(this.path, concatListContent([clipName]))
    this.names.push(clipName)
  }

  get entries(): readonly string[] {
    return this.names
  }
}

/**
 * Clip names listed in a manifest, in order. Lines that are not
 * `file '<name>'` entries are ignored.
 */
export function parseManifest(content: string): string[] {
  const names: string[] = []
  for (const line of content.split(/\r?\n/)) {
    const match = line.trim().match(ENTRY_PATTERN)
    if (match) {
      names.push(match[1].replace(/'\\''/g, `'`))
    }
  }
  return names
}
