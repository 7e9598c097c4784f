/**
 * Unit counter.
 *
 * Reads UTF-8 input line by line and tallies characters, `\w+` words or
 * whole lines into a FrequencyTable. A line that fails to decode aborts the
 * whole call; no partial table is ever returned.
 *
 * @example
 * const freq = count('aa bb cc bb', CountMode.Word)
 * freq.get('bb') // 2
 */
import { getErrorMessage, isCountError } from '../lib/errors'
import { makeLogger } from '../lib/logger'
import { increment, totalUnits } from './frequencyTable'
import { LineSplitter } from './lineSplitter'
import {
  DEFAULT_COUNT_MODE,
  type AsyncByteSource,
  type ByteSource,
  type Chunk,
  type CountMode,
  type FrequencyTable,
} from './types'

const log = makeLogger('counter')

// Unicode \w: Alphabetic, Mark, Decimal_Number, Connector_Punctuation, Join_Control
const WORD_PATTERN = /[\p{Alphabetic}\p{M}\p{Nd}\p{Pc}\p{Join_Control}]+/gu

function tally(table: FrequencyTable, line: string, mode: CountMode): void {
  switch (mode) {
    case 'char':
      // for..of walks code points, not UTF-16 units
      for (const char of line) increment(table, char)
      return
    case 'word':
      for (const word of line.match(WORD_PATTERN) ?? []) increment(table, word)
      return
    case 'line':
      increment(table, line)
      return
    default: {
      const exhaustive: never = mode
      throw new Error(`Unhandled count mode: ${String(exhaustive)}`)
    }
  }
}

function isSingleChunk(input: AsyncByteSource): input is Chunk {
  return typeof input === 'string' || input instanceof Uint8Array
}

function isAsyncIterable(input: AsyncByteSource): input is AsyncIterable<Chunk> {
  return typeof input === 'object' && Symbol.asyncIterator in input
}

function chunksOf(input: ByteSource): Iterable<Chunk> {
  return isSingleChunk(input) ? [input] : input
}

async function* asyncChunksOf(input: AsyncByteSource): AsyncGenerator<Chunk, void, undefined> {
  if (isAsyncIterable(input)) {
    yield* input
  } else {
    yield* chunksOf(input)
  }
}

function finish(table: FrequencyTable, splitter: LineSplitter, mode: CountMode): FrequencyTable {
  for (const line of splitter.end()) tally(table, line, mode)
  log.debug(`mode=${mode} lines=${splitter.lines} units=${totalUnits(table)} keys=${table.size}`)
  return table
}

function reportFailure(error: unknown): void {
  if (isCountError(error)) {
    log.warn(error.message)
  } else {
    // e.g. a source stream that errored mid-read
    log.error('count failed:', getErrorMessage(error))
  }
}

/**
 * Count units of `mode` in `input`.
 *
 * @param input - Text, a byte buffer, or an iterable of chunks
 * @param mode - Defaults to word
 * @throws CountError (InvalidEncoding) when any line is not valid UTF-8
 */
export function count(input: ByteSource, mode: CountMode = DEFAULT_COUNT_MODE): FrequencyTable {
  const table: FrequencyTable = new Map()
  const splitter = new LineSplitter()

  try {
    for (const chunk of chunksOf(input)) {
      for (const line of splitter.push(chunk)) tally(table, line, mode)
    }
    return finish(table, splitter, mode)
  } catch (error) {
    reportFailure(error)
    throw error
  }
}

/**
 * Same as `count`, reading from an async source such as a Node `Readable`.
 * Rejects with CountError (InvalidEncoding) on malformed input.
 */
export async function countAsync(
  input: AsyncByteSource,
  mode: CountMode = DEFAULT_COUNT_MODE
): Promise<FrequencyTable> {
  const table: FrequencyTable = new Map()
  const splitter = new LineSplitter()

  try {
    for await (const chunk of asyncChunksOf(input)) {
      for (const line of splitter.push(chunk)) tally(table, line, mode)
    }
    return finish(table, splitter, mode)
  } catch (error) {
    reportFailure(error)
    throw error
  }
}
