/**
 * Seccurate library entry point.
 *
 * Exports the curation pipeline for programmatic use; the CLI in
 * src/index.ts is a thin layer over the same functions.
 */

export * from '../types/index.js';
export * from '../runner/index.js';

export {
  atomicWriteText,
  atomicWriteJson,
  readJsonFile,
  appendJsonLine,
  readJsonLines,
  AtomicFsError,
} from './fs.js';
export type { JsonLine } from './fs.js';

export {
  loadConfig,
  findConfigFile,
  validateConfig,
  mergeConfig,
  ConfigError,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
} from './config.js';
export type { LoadedConfig, PartialConfig } from './config.js';

export { parseUnifiedDiff, normalizeDiffPath, touchedFiles, lenPatch } from './diff.js';
export { analyzeStructure, structureModeFor } from './structure.js';
export type { FileStructure, StructureMode, SyntaxUnit } from './structure.js';
export { resolveMaskScope, matchesGlob } from './scope.js';
export type { MaskScope, ExcludedHunk } from './scope.js';
export { computeMask, applyMask, unmask, mergeSpans } from './mask.js';
export type { MaskHint, MaskHintKind, MaskRequest } from './mask.js';
export { renderRemovalDiff } from './patch.js';

export { ClaudeCliCapability, runCli } from './capability.js';
export type { CliRunner } from './capability.js';
export { DescriptionAgent } from './describe.js';
export type { DescribeOptions, DescriptionFeedback } from './describe.js';
export { VerificationAgent, compareMapping } from './verify.js';
export type { VerifyOptions } from './verify.js';
export { assembleTask } from './assemble.js';

export { loadCommits, readTasks, readProcessedIds, JsonlSink } from './dataset.js';
export type { InvalidCommitLine, LoadedCommits } from './dataset.js';
export { renderTaskFiles, writeTaskRendering } from './render.js';
export { computeStats, writeStats } from './stats.js';
export type { DatasetStats, TaskStats } from './stats.js';
