export type {
  MetadataReader,
  TimestampProvider,
  FallbackTimestampProvider,
} from "./metadataReader";
export {
  ExifMetadataReader,
  exifFieldProvider,
  modifiedTimeProvider,
  parseExifDateTime,
} from "./metadataReader";
export type { ExistencePredicate } from "./filenameDeriver";
export {
  formatTimestamp,
  buildBaseName,
  resolveUniqueName,
  fileExistsIn,
  planOutput,
} from "./filenameDeriver";
export type { ImageTranscoder } from "./imageTranscoder";
export { SharpImageTranscoder, computeTargetSize } from "./imageTranscoder";
export type { OptimizationService } from "./batchOptimizer";
export { BatchOptimizationService } from "./batchOptimizer";
export type { Reporter } from "./reporter";
export { ConsoleReporter, SilentReporter } from "./reporter";
