import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs'
import * as path from 'path'
import { ClipManifest, parseManifest } from '../manifest'
import { makeTempDir } from './helpers/fakes'

describe('ClipManifest', () => {
  let dir: string
  let manifestPath: string

  beforeEach(() => {
    dir = makeTempDir('manifest-test')
    manifestPath = path.join(dir, 'output_files.txt')
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('truncates a previous list on start', () => {
    fs.writeFileSync(manifestPath, `file 'stale.mp4'\n`)

    const manifest = new ClipManifest(manifestPath)
    manifest.start()

    expect(fs.readFileSync(manifestPath, 'utf-8')).toBe('')
    expect(manifest.entries).toEqual([])
  })

  it('writes each entry as it is appended', () => {
    const manifest = new ClipManifest(manifestPath)
    manifest.start()

    manifest.append('part_0.mp4')
    expect(fs.readFileSync(manifestPath, 'utf-8')).toBe(`file 'part_0.mp4'\n`)

    manifest.append('part_2.mp4')
    expect(fs.readFileSync(manifestPath, 'utf-8')).toBe(`file 'part_0.mp4'\nfile 'part_2.mp4'\n`)
    expect(manifest.entries).toEqual(['part_0.mp4', 'part_2.mp4'])
  })

  it('round-trips names with quotes', () => {
    const manifest = new ClipManifest(manifestPath)
    manifest.start()
    manifest.append(`it's_part_0.mp4`)

    expect(parseManifest(fs.readFileSync(manifestPath, 'utf-8'))).toEqual([`it's_part_0.mp4`])
  })
})

describe('parseManifest', () => {
  it('ignores lines that are not file entries', () => {
    const content = `# clips\nfile 'a.mp4'\r\n\nduration 2\n  file 'b.mp4'  \n`
    expect(parseManifest(content)).toEqual(['a.mp4', 'b.mp4'])
  })
})
