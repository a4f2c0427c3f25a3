export { Logger, createLogger, consoleSink, formatLogEntry } from './Logger.js';
export type { ILogger, LogEntry, LogSink } from './Logger.js';

export {
  SlidesmithError,
  PPTTemplateError,
  PPTGenError,
  MarkdownDocumentError,
  NotFoundError,
  CatalogError,
  PackageError,
  TreeError,
  errorMessage,
} from './errors.js';
export type { ErrorCode } from './errors.js';

export {
  ImageDecoder,
  IMAGE_EXTENSIONS,
  isImagePath,
  type ImageFormat,
  type ImageDecoderConfig,
} from './ImageDecoder.js';

export { numberToWords } from './numberToWords.js';
export { pickRandom, randomIndex } from './random.js';
export type { RandomSource } from './random.js';
