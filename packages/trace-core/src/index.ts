export type {
  DocumentKind,
  DocumentRecord,
  Finding,
  FindingKind,
  FindingSeverity,
  ItemRecord,
  KnownResultStatus,
  LinkInput,
  LinkRecord,
  ResultCount,
  ResultMapping,
  ReviewableContent,
  RiskRating,
  TestResultRecord,
  TreeState,
} from "./types.js";

export {
  TraceGraphError,
  TraceGraphErrorCodes,
  type TraceGraphErrorCode,
  CyclicHierarchyError,
  DocumentNotFoundError,
  DuplicateItemError,
  InvalidLinkError,
  InvalidTreeError,
  ItemNotFoundError,
  MalformedIdError,
  TreeStateError,
  UnknownItemError,
} from "./errors.js";

export {
  RESERVED_PREFIXES,
  formatUid,
  isReservedPrefix,
  isValidPrefix,
  isValidUid,
  parseUid,
  prefixOf,
  type ParsedUid,
} from "./uid.js";

export { fingerprint } from "./fingerprint.js";
export { rpn } from "./risk.js";

export {
  DEFAULT_SETTINGS,
  TraceSettingsSchema,
  classifyPrefix,
  parseSettings,
  resolveSettings,
  type TraceSettings,
} from "./settings.js";

export { Item, type ChangeListener, type ItemLink } from "./item.js";
export { Document, type DocumentOptions } from "./document.js";
export { Tree, type TreeOptions } from "./tree.js";

export { formatFinding, hasErrors, summarizeFindings, type FindingSummary } from "./findings.js";

export {
  buildTraceabilityMatrix,
  type MatrixOptions,
  type TraceabilityRow,
} from "./matrix.js";

export {
  ResultMappingSchema,
  TestResultRecordSchema,
  parseResultMapping,
  summarizeResults,
} from "./results.js";
