/**
 * Counter Types
 */

// ============================================================================
// COUNT MODE
// ============================================================================

export const CountMode = {
  /** Every Unicode scalar value */
  Char: 'char',
  /** Every `\w+` match */
  Word: 'word',
  /** Every `\n` or `\r\n` delimited line */
  Line: 'line',
} as const

export type CountMode = (typeof CountMode)[keyof typeof CountMode]

export const DEFAULT_COUNT_MODE: CountMode = CountMode.Word

// ============================================================================
// INPUT / OUTPUT
// ============================================================================

/**
 * Unit text → occurrence count. Iteration order carries no meaning.
 */
export type FrequencyTable = Map<string, number>

export type Chunk = Uint8Array | string

/**
 * Synchronous input accepted by `count`.
 * Node `Buffer` is a `Uint8Array` and is read as one chunk.
 */
export type ByteSource = string | Uint8Array | Iterable<Chunk>

/**
 * Asynchronous input accepted by `countAsync`, such as a Node `Readable`.
 */
export type AsyncByteSource = ByteSource | AsyncIterable<Chunk>
