export * from './domain/models/types';
export * from './domain/errors';
export { determineAssetKind, guessMimeType, kindFromMimeType } from './domain/assets/AssetKinds';
export {
  ClassifierConfig,
  Classification,
  DEFAULT_CLASSIFIER_CONFIG,
  DEFAULT_TRACKER_PATTERNS,
  PathAllocator,
  URLClassifier,
  toLocalReference,
} from './domain/assets/URLClassifier';
export { RewriteMapAccumulator } from './domain/assets/RewriteMapAccumulator';
export { ReferenceScanner } from './domain/assets/ReferenceScanner';
export { RewriteOutcome, URLRewriter } from './domain/assets/URLRewriter';
export {
  defaultRewrittenManifestPath,
  loadManifest,
  parseManifest,
  readManifestFile,
  writeManifest,
} from './domain/manifest/ManifestLoader';
export { convertHar, extractHarResources, HarResource, mergeResources } from './domain/har/HarConverter';
export { ResourceFetcher, ResourceFetcherOptions } from './services/ResourceFetcher';
export { CapturePipeline, CaptureOptions, CaptureReport, formatSummary, summarize } from './services/CapturePipeline';
export { LoggingService, createLogger } from './services/LoggingService';
export { StaticServer, createStaticApp } from './server/StaticServer';
