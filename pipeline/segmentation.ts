/**
 * Transcript segmentation
 * Speaker-tagged paragraphs -> length-bounded sentence groups
 */

import type { Paragraph, PipelineConfig, SentenceChunk } from '../shared/types'

/**
 * `token:` followed by free text up to the next tag or end of input.
 *
 * Known limitation: a tag-like word followed by a colon inside content
 * ("Note: ...", "https://...") starts a new paragraph. The grammar has no
 * escape for it.
 */
const PARAGRAPH_PATTERN = /([A-Za-z[\]]+):\s*([\s\S]*?)(?=[A-Za-z[\]]+:|$)/g

// Whitespace run directly after sentence-ending punctuation
const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/

// Length in code points
function charCount(text: string): number {
  return Array.from(text).length
}

/**
 * Extract speaker-attributed paragraphs in document order
 */
export function extractParagraphs(text: string): Paragraph[] {
  const paragraphs: Paragraph[] = []

  for (const match of text.matchAll(PARAGRAPH_PATTERN)) {
    paragraphs.push({
      speaker: match[1].trim(),
      content: match[2].trim()
    })
  }

  return paragraphs
}

/**
 * Greedy sentence packer. A chunk is flushed once the summed length of its
 * sentences exceeds `minLength`; the remainder after the last sentence is
 * flushed as a final, possibly short, chunk. Sentences are never split.
 */
export function splitIntoChunks(content: string, minLength: number): SentenceChunk[] {
  const chunks: SentenceChunk[] = []
  let pending: string[] = []
  let pendingLength = 0

  const flush = (): void => {
    chunks.push({ sentences: pending, text: pending.join(' ') })
    pending = []
    pendingLength = 0
  }

  for (const fragment of content.split(SENTENCE_BOUNDARY)) {
    const sentence = fragment.trim()
    if (sentence.length === 0) continue

    pending.push(sentence)
    pendingLength += charCount(sentence)

    if (pendingLength > minLength) {
      flush()
    }
  }

  if (pending.length > 0) {
    flush()
  }

  return chunks
}

/**
 * Paragraphs spoken by the process speaker with at least `minLength` characters
 */
export function selectParagraphs(
  paragraphs: readonly Paragraph[],
  processSpeaker: string,
  minLength: number
): Paragraph[] {
  return paragraphs.filter(
    (p) => p.speaker === processSpeaker && charCount(p.content) >= minLength
  )
}

/**
 * All chunks of a transcript for the configured speaker, in order
 */
export function segmentParagraphs(
  paragraphs: readonly Paragraph[],
  config: Pick<PipelineConfig, 'processSpeaker' | 'minSentenceLength'>
): SentenceChunk[] {
  return selectParagraphs(paragraphs, config.processSpeaker, config.minSentenceLength)
    .flatMap((p) => splitIntoChunks(p.content, config.minSentenceLength))
}
