/**
 * Error taxonomy for the item graph.
 *
 * Structural errors (cyclic hierarchy, broken tree, malformed ids) abort the
 * operation that found them. Referential and staleness problems are never
 * thrown; they are reported as validation findings instead.
 */

export const TraceGraphErrorCodes = {
  /** Item id does not match the prefix/separator/number shape */
  MALFORMED_ID: "MALFORMED_ID",
  /** Link would point at its own item or at a malformed id */
  INVALID_LINK: "INVALID_LINK",
  /** No loaded document claims the id's prefix */
  UNKNOWN_ITEM: "UNKNOWN_ITEM",
  /** Document exists but does not contain the id */
  ITEM_NOT_FOUND: "ITEM_NOT_FOUND",
  /** No loaded document has the prefix */
  DOCUMENT_NOT_FOUND: "DOCUMENT_NOT_FOUND",
  /** Document already contains the id */
  DUPLICATE_ITEM: "DUPLICATE_ITEM",
  /** A document's parent chain loops back on itself */
  CYCLIC_HIERARCHY: "CYCLIC_HIERARCHY",
  /** Duplicate prefixes, orphaned parents and reserved prefixes */
  INVALID_TREE: "INVALID_TREE",
  /** Operation is not allowed in the tree's current lifecycle state */
  TREE_STATE: "TREE_STATE",
} as const;

export type TraceGraphErrorCode = (typeof TraceGraphErrorCodes)[keyof typeof TraceGraphErrorCodes];

export class TraceGraphError extends Error {
  public readonly code: TraceGraphErrorCode;

  constructor(message: string, code: TraceGraphErrorCode) {
    super(message);
    this.name = "TraceGraphError";
    this.code = code;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class MalformedIdError extends TraceGraphError {
  public readonly id: string;

  constructor(id: string, reason = "expected <PREFIX><sep?><digits>") {
    super(`Malformed item id "${id}": ${reason}`, TraceGraphErrorCodes.MALFORMED_ID);
    this.name = "MalformedIdError";
    this.id = id;
  }
}

export class InvalidLinkError extends TraceGraphError {
  public readonly sourceId: string;
  public readonly targetId: string;

  constructor(sourceId: string, targetId: string, reason: string) {
    super(`Cannot link ${sourceId} to ${targetId}: ${reason}`, TraceGraphErrorCodes.INVALID_LINK);
    this.name = "InvalidLinkError";
    this.sourceId = sourceId;
    this.targetId = targetId;
  }
}

export class UnknownItemError extends TraceGraphError {
  public readonly id: string;
  public readonly prefix: string;

  constructor(id: string, prefix: string) {
    super(`Unknown item ${id}: no document with prefix "${prefix}"`, TraceGraphErrorCodes.UNKNOWN_ITEM);
    this.name = "UnknownItemError";
    this.id = id;
    this.prefix = prefix;
  }
}

export class ItemNotFoundError extends TraceGraphError {
  public readonly id: string;
  public readonly prefix: string;

  constructor(id: string, prefix: string) {
    super(`Item ${id} not found in document ${prefix}`, TraceGraphErrorCodes.ITEM_NOT_FOUND);
    this.name = "ItemNotFoundError";
    this.id = id;
    this.prefix = prefix;
  }
}

export class DocumentNotFoundError extends TraceGraphError {
  public readonly prefix: string;

  constructor(prefix: string) {
    super(`No document with prefix "${prefix}"`, TraceGraphErrorCodes.DOCUMENT_NOT_FOUND);
    this.name = "DocumentNotFoundError";
    this.prefix = prefix;
  }
}

export class DuplicateItemError extends TraceGraphError {
  public readonly id: string;

  constructor(id: string, prefix: string) {
    super(`Item ${id} already exists in document ${prefix}`, TraceGraphErrorCodes.DUPLICATE_ITEM);
    this.name = "DuplicateItemError";
    this.id = id;
  }
}

export class CyclicHierarchyError extends TraceGraphError {
  /** Prefixes along the ancestor path, ending with the revisited one. */
  public readonly path: string[];

  constructor(path: string[]) {
    super(`Cyclic document hierarchy: ${path.join(" -> ")}`, TraceGraphErrorCodes.CYCLIC_HIERARCHY);
    this.name = "CyclicHierarchyError";
    this.path = path;
  }
}

export class InvalidTreeError extends TraceGraphError {
  constructor(message: string) {
    super(message, TraceGraphErrorCodes.INVALID_TREE);
    this.name = "InvalidTreeError";
  }
}

export class TreeStateError extends TraceGraphError {
  constructor(operation: string, state: string) {
    super(`Cannot ${operation} while tree is ${state}`, TraceGraphErrorCodes.TREE_STATE);
    this.name = "TreeStateError";
  }
}
