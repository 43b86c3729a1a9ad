/**
 * faultscope Types
 * Data model shared by the walker, extractors and renderer
 */

// ============================================================
// ERROR CATEGORY
// ============================================================

/** Classification used to select a root-cause extractor */
export type ErrorCategory =
  | 'KeyLookup'
  | 'IndexRange'
  | 'TypeMismatch'
  | 'MemberNotFound'
  | 'UndefinedIdentifier'
  | 'Other';

/** Categories that have a dedicated extractor */
export type AnalyzedCategory = Exclude<ErrorCategory, 'Other'>;

// ============================================================
// CALL FRAMES
// ============================================================

/** Function name given to top-level code */
export const TOP_LEVEL_NAME = '<main>';

/** Function name given to unnamed functions below the top level */
export const ANONYMOUS_NAME = '<anonymous>';

/**
 * One activation record at the time of the error.
 * Frames link from the outermost caller toward the fault site.
 */
export interface CallFrame {
  readonly functionName: string;
  /** Absolute path of the source file */
  readonly sourceFile: string;
  /** 1-based line currently executing in this frame */
  readonly sourceLine: number;
  /** Locals recorded for this frame (empty when none were recorded) */
  readonly bindings: ReadonlyMap<string, unknown>;
  /** The frame this one called; undefined for the fault frame */
  readonly next?: CallFrame | undefined;
}

/** Result of walking a frame chain */
export interface StackWalk {
  /** Innermost frame, where the error was raised */
  readonly faultFrame: CallFrame;
  /** Every frame, fault frame first */
  readonly frames: readonly CallFrame[];
}

// ============================================================
// RAISED ERROR
// ============================================================

/** A thrown value as seen by the reporter */
export interface RaisedError {
  readonly category: ErrorCategory;
  /** Runtime type name of the thrown value (e.g. TypeError) */
  readonly name: string;
  readonly message: string;
  /** Outermost frame of the chain, undefined when no frame was found */
  readonly stackChain: CallFrame | undefined;
  /** The original thrown value */
  readonly thrown: unknown;
}

// ============================================================
// FRAME STATE
// ============================================================

export type BindingClassification = 'Module' | 'Callable' | 'Value';

/** Printed bindings of one frame, split by classification */
export interface FrameState {
  readonly modules: ReadonlyMap<string, string>;
  readonly callables: ReadonlyMap<string, string>;
  readonly values: ReadonlyMap<string, string>;
}

// ============================================================
// SOURCE WINDOW
// ============================================================

export interface WindowLine {
  readonly lineNumber: number;
  /** Line text without its terminator */
  readonly text: string;
  readonly isFaultLine: boolean;
}

/**
 * Source lines around a fault line.
 * An unavailable file or line yields a window with no lines.
 */
export interface SourceWindow {
  readonly file: string;
  readonly centerLine: number;
  readonly startLine: number;
  readonly endLine: number;
  readonly totalLines: number;
  readonly lines: readonly WindowLine[];
  readonly truncatedAbove: boolean;
  readonly truncatedBelow: boolean;
}

// ============================================================
// DIAGNOSTIC DETAIL
// ============================================================

export interface KeyLookupDetail {
  readonly category: 'KeyLookup';
  readonly containerName: string;
  readonly containerRepr: string;
  /** Printed form of the missing key */
  readonly missingKey: string;
  readonly availableKeys: readonly unknown[];
  readonly similarKeys: readonly unknown[];
}

export interface CollectionDetail {
  readonly category: 'IndexRange' | 'TypeMismatch';
  readonly collectionName: string;
  readonly collectionRepr: string;
  readonly length: number;
  /** Set for arrays and typed arrays only */
  readonly validIndices?: string | undefined;
  /** Bracket expression of the fault line, null when unparseable */
  readonly attemptedIndex: string | null;
}

export interface MemberNotFoundDetail {
  readonly category: 'MemberNotFound';
  readonly objectName: string;
  readonly objectRepr: string;
  readonly typeName: string;
  readonly missingMember: string;
  /** At most MAX_LISTED_MEMBERS names */
  readonly members: readonly string[];
  /** Number of members before truncation */
  readonly memberCount: number;
  readonly similarMembers: readonly string[];
}

export interface UndefinedIdentifierDetail {
  readonly category: 'UndefinedIdentifier';
  readonly name: string;
  readonly similarNames: readonly string[];
}

export type DiagnosticDetail =
  | KeyLookupDetail
  | CollectionDetail
  | MemberNotFoundDetail
  | UndefinedIdentifierDetail;

/**
 * Output of an extractor. Failures are carried as notes only.
 */
export interface ExtractionResult {
  readonly detail: DiagnosticDetail | undefined;
  readonly notes: readonly string[];
}

// ============================================================
// REPORT
// ============================================================

export interface SystemInfo {
  readonly runtimeVersion: string;
  readonly platform: string;
  readonly cwd: string;
  readonly searchPaths: readonly string[];
}

/** Everything the renderer needs for one error */
export interface FaultReport {
  readonly error: RaisedError;
  readonly walk: StackWalk;
  readonly state: FrameState;
  readonly window: SourceWindow;
  readonly extraction: ExtractionResult;
  readonly system: SystemInfo;
}
