/**
 * faultscope Module
 * Exports the reporter, scope recorder, strict containers and analysis stages
 */

export {
  BANNER,
  type InstallOptions,
  installReporter,
  isReporterInstalled,
  UNCAUGHT_EXIT_CODE,
  uninstallReporter,
} from './install.js';
export {
  activeScopeDepth,
  getScopeSnapshot,
  type LocalsProvider,
  scope,
  type ScopeSnapshot,
} from './scope.js';
export { strict } from './strict.js';
export {
  FaultscopeError,
  IndexRangeError,
  KeyLookupError,
} from './error-classes.js';
export {
  assembleReport,
  buildReport,
  defaultCallbacks,
  formatDefaultPresentation,
  type ReportErrorOptions,
  reportError,
  type ReporterCallbacks,
  type ReportOutcome,
} from './report.js';
export {
  MAX_VALUE_LENGTH,
  NOTE_PREFIX,
  renderReport,
  type RenderOptions,
  shortenPath,
  truncateValue,
} from './render.js';
export { categorize, classifyError, runtimeTypeName } from './classify.js';
export { buildStackChain, chainFromError, walkStack } from './stack/walker.js';
export { parseStackTrace, type StackEntry } from './stack/parse.js';
export {
  classifyRepresentation,
  extractFrameState,
  representValue,
  safeRepresent,
} from './frame-state.js';
export {
  buildSourceWindow,
  clearSourceCache,
  CONTEXT_RADIUS,
  getSourceLine,
} from './source-context.js';
export {
  EXTRACTORS,
  type Extractor,
  extractDetail,
  findSimilar,
  listMembers,
  MAX_LISTED_MEMBERS,
} from './extractors/index.js';
export { collectSystemInfo, moduleSearchPaths } from './system-info.js';
export {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  parseConfig,
  type ReporterConfig,
  resolveConfig,
} from './config.js';
export {
  ANONYMOUS_NAME,
  type AnalyzedCategory,
  type BindingClassification,
  type CallFrame,
  type CollectionDetail,
  type DiagnosticDetail,
  type ErrorCategory,
  type ExtractionResult,
  type FaultReport,
  type FrameState,
  type KeyLookupDetail,
  type MemberNotFoundDetail,
  type RaisedError,
  type SourceWindow,
  type StackWalk,
  type SystemInfo,
  TOP_LEVEL_NAME,
  type UndefinedIdentifierDetail,
  type WindowLine,
} from './types.js';
