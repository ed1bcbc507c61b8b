export * from './common/errors';
export type { FileRecord, ProtectedZone, ScanIssue, ScanResult } from './common/fileTypes';
export { createProtectionIndex, detectProtectedZones, DEFAULT_PROTECTION_MARKERS } from './common/protectedZones';
export type { ProtectionIndex, ProtectionMarkers } from './common/protectedZones';
export { loadConfig, resolveConfig } from './main/config';
export type { AppConfig } from './main/config';
export { scanDirectory, streamFileRecords } from './main/scanner';
export { diffSnapshots, summariseDiff } from './main/syncDiff';
export { runSync } from './main/syncEngine';
export type { SyncReport } from './main/syncEngine';
export { SyncWatcher } from './main/watcher';
export { annotateFiles } from './main/providers/annotator';
export { createProviders } from './main/providers/createProviders';
export { DictionaryTagProvider } from './main/providers/dictionaryTagger';
export { FallbackTagProvider } from './main/providers/fallbackTagger';
export { OllamaTagProvider } from './main/providers/ollamaTagger';
export { OllamaEmbeddingProvider } from './main/providers/ollamaEmbedder';
export { createIndexClient } from './main/searchIndex/createIndexClient';
export { FileIndexClient } from './main/searchIndex/fileIndexClient';
export { MeilisearchIndexClient } from './main/searchIndex/meiliIndexClient';
export { clusterByTags, cosineSimilarity } from './main/organiser/tagClusterer';
export { FolderNameGenerator, sanitiseFolderName } from './main/organiser/folderNames';
export { buildMovePlan, nameClusters } from './main/organiser/planner';
export { checkPlanEntry, executePlan } from './main/organiser/safeMover';
export { renderExecutionReport, renderPlanTree, renderSyncReport } from './main/organiser/planPreview';
export { runReorganisation } from './main/organiser/reorganise';
export type * from './types/diff';
export type * from './types/plan';
export type * from './types/providers';
export type * from './types/snapshot';
