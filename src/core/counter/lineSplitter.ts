import { invalidEncoding } from '../lib/errors'
import type { Chunk } from './types'

const NEWLINE = 0x0a
const CARRIAGE_RETURN = 0x0d

const EMPTY = new Uint8Array(0)
const encoder = new TextEncoder()

// With the u flag a valid pair is one code point, so only lone surrogates match
const LONE_SURROGATE = /\p{Cs}/u

function endsWithHighSurrogate(text: string): boolean {
  const last = text.charCodeAt(text.length - 1)
  return last >= 0xd800 && last <= 0xdbff
}

function countNewlines(text: string): number {
  let total = 0
  for (let i = text.indexOf('\n'); i !== -1; i = text.indexOf('\n', i + 1)) total += 1
  return total
}

/**
 * Splits a byte stream into UTF-8 decoded lines.
 *
 * - `\n` ends a line, and a `\r` directly before it is dropped too
 * - a lone `\r` is content
 * - the last line is produced by `end()` even without a terminator
 * - every line is decoded strictly; malformed bytes throw `CountError(InvalidEncoding)`
 * - string chunks must be well-formed UTF-16; a surrogate pair may straddle two chunks
 *
 * `push` and `end` are generators and must be drained before the next chunk.
 * Only the unterminated tail of the current line is held between chunks.
 */
export class LineSplitter {
  // ignoreBOM keeps a leading U+FEFF as content
  private readonly decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true })
  private pending: Uint8Array[] = []
  private pendingLength = 0
  private highSurrogate = ''
  private lineNumber = 0;

  /** Feed one chunk, yielding each line it completes as soon as it is decoded */
  *push(chunk: Chunk): Generator<string, void, undefined> {
    const bytes = typeof chunk === 'string' ? this.encodeText(chunk) : this.acceptBytes(chunk)
    let start = 0
    let index = bytes.indexOf(NEWLINE, start)

    while (index !== -1) {
      yield this.emit(bytes.subarray(start, index), true)
      start = index + 1
      index = bytes.indexOf(NEWLINE, start)
    }

    if (start < bytes.length) {
      // Copy: callers (fs streams included) may reuse their buffers, and Buffer#slice is a view
      this.pending.push(Uint8Array.from(bytes.subarray(start)))
      this.pendingLength += bytes.length - start
    }
  }

  /** Flush the unterminated last line, if any */
  *end(): Generator<string, void, undefined> {
    this.rejectCarriedSurrogate()
    if (this.pendingLength > 0) {
      yield this.emit(EMPTY, false)
    }
  }

  /** Lines decoded so far */
  get lines(): number {
    return this.lineNumber
  }

  private encodeText(chunk: string): Uint8Array {
    let text = this.highSurrogate + chunk
    this.highSurrogate = ''
    if (endsWithHighSurrogate(text)) {
      this.highSurrogate = text.slice(-1)
      text = text.slice(0, -1)
    }

    const lone = LONE_SURROGATE.exec(text)
    if (lone) {
      const line = this.lineNumber + 1 + countNewlines(text.slice(0, lone.index))
      throw invalidEncoding(line, new TypeError(`Unpaired surrogate at offset ${lone.index}`))
    }
    return encoder.encode(text)
  }

  private acceptBytes(chunk: Uint8Array): Uint8Array {
    this.rejectCarriedSurrogate()
    return chunk
  }

  private rejectCarriedSurrogate(): void {
    if (this.highSurrogate !== '') {
      throw invalidEncoding(this.lineNumber + 1, new TypeError('Unpaired surrogate at end of chunk'))
    }
  }

  private emit(tail: Uint8Array, terminated: boolean): string {
    let line = this.takeLine(tail)
    if (terminated && line.length > 0 && line[line.length - 1] === CARRIAGE_RETURN) {
      line = line.subarray(0, line.length - 1)
    }

    this.lineNumber += 1
    try {
      return this.decoder.decode(line)
    } catch (error) {
      throw invalidEncoding(this.lineNumber, error)
    }
  }

  private takeLine(tail: Uint8Array): Uint8Array {
    if (this.pendingLength === 0) return tail

    const line = new Uint8Array(this.pendingLength + tail.length)
    let offset = 0
    for (const part of this.pending) {
      line.set(part, offset)
      offset += part.length
    }
    line.set(tail, offset)

    this.pending = []
    this.pendingLength = 0
    return line
  }
}
