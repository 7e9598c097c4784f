export { count, countAsync } from './core/counter/count'
export { isCountMode, parseCountMode } from './core/counter/countMode'
export { sortedEntries, totalUnits } from './core/counter/frequencyTable'
export { LineSplitter } from './core/counter/lineSplitter'
export {
  CountMode,
  DEFAULT_COUNT_MODE,
  type AsyncByteSource,
  type ByteSource,
  type Chunk,
  type FrequencyTable,
} from './core/counter/types'
export { CountError, ErrorType, getErrorMessage, isCountError } from './core/lib/errors'
export { makeLogger, type Logger, type LogLevel } from './core/lib/logger'
