import { Document } from "./document.js";
import {
  CyclicHierarchyError,
  DocumentNotFoundError,
  InvalidLinkError,
  InvalidTreeError,
  TreeStateError,
  UnknownItemError,
} from "./errors.js";
import { Item } from "./item.js";
import { DEFAULT_SETTINGS, resolveSettings, type TraceSettings } from "./settings.js";
import { isValidUid, parseUid, prefixOf } from "./uid.js";
import type { DocumentKind, DocumentRecord, Finding, ItemRecord, TreeState } from "./types.js";

export interface TreeOptions {
  settings?: TraceSettings;
}

function pushInto(index: Map<string, Item[]>, key: string, item: Item): void {
  let bucket = index.get(key);
  if (!bucket) {
    bucket = [];
    index.set(key, bucket);
  }
  bucket.push(item);
}

/**
 * Document hierarchy plus the item link graph.
 *
 * Items declare links towards the items they trace from (parents). The tree
 * keeps the inverse view in a link index. Documents report item and link
 * changes, including edits made directly on an item, and the index is rebuilt
 * from scratch on the next read that needs it.
 */
export class Tree {
  readonly settings: TraceSettings;
  private stateValue: TreeState = "empty";
  private order: Document[] = [];
  private byPrefix = new Map<string, Document>();
  private childIndex = new Map<string, Item[]>();
  private stakeholderIndex = new Map<string, Item[]>();
  private indexStale = true;

  constructor(options: TreeOptions = {}) {
    this.settings = options.settings ?? DEFAULT_SETTINGS;
  }

  static fromRecords(records: DocumentRecord[], options: { settings?: unknown } = {}): Tree {
    const tree = new Tree({ settings: resolveSettings(options.settings) });
    return tree.load(records.map((record) => Document.fromRecord(record, tree.settings)));
  }

  get state(): TreeState {
    return this.stateValue;
  }

  get documents(): Document[] {
    return [...this.order];
  }

  load(documents: Iterable<Document>): this {
    if (this.stateValue !== "empty") {
      throw new TreeStateError("load", this.stateValue);
    }
    this.stateValue = "loading";
    try {
      const order: Document[] = [];
      const byPrefix = new Map<string, Document>();
      for (const document of documents) {
        if (byPrefix.has(document.prefix)) {
          throw new InvalidTreeError(`Duplicate document prefix "${document.prefix}"`);
        }
        byPrefix.set(document.prefix, document);
        order.push(document);
      }
      assertAcyclic(order, byPrefix);
      this.order = order;
      this.byPrefix = byPrefix;
      for (const document of order) {
        document.setChangeListener(() => {
          this.indexStale = true;
        });
      }
    } catch (error) {
      this.fail();
      throw error;
    }
    for (const item of this.order.flatMap((document) => document.items)) {
      this.stampMissing(item);
    }
    this.indexStale = true;
    this.stateValue = "loaded";
    return this;
  }

  discard(): void {
    this.clear();
    this.stateValue = "discarded";
  }

  items(): Item[] {
    this.assertReadable("list items");
    return this.order.flatMap((document) => document.items);
  }

  findDocument(prefix: string): Document {
    this.assertReadable("find a document");
    const document = this.byPrefix.get(prefix);
    if (!document) {
      throw new DocumentNotFoundError(prefix);
    }
    return document;
  }

  findItem(id: string): Item {
    this.assertReadable("find an item");
    const { prefix } = parseUid(id);
    const document = this.byPrefix.get(prefix);
    if (!document) {
      throw new UnknownItemError(id, prefix);
    }
    return document.findItem(id);
  }

  resolveLink(item: Item, targetId: string): Item {
    if (targetId === item.id) {
      throw new InvalidLinkError(item.id, targetId, "an item cannot link to itself");
    }
    return this.findItem(targetId);
  }

  documentOf(item: Item): Document {
    return this.findDocument(prefixOf(item.id));
  }

  kindOf(item: Item): DocumentKind {
    return this.documentOf(item).kind;
  }

  getParents(item: Item): Item[] {
    this.assertReadable("read links");
    return item.links
      .map((id) => this.lookup(id))
      .filter((parent): parent is Item => parent !== undefined);
  }

  getChildren(item: Item): Item[] {
    this.assertReadable("read links");
    this.ensureIndexes();
    return [...(this.childIndex.get(item.id) ?? [])];
  }

  getStakeholderItems(role: Item): Item[] {
    this.assertReadable("read stakeholders");
    this.ensureIndexes();
    return [...(this.stakeholderIndex.get(role.id) ?? [])];
  }

  /**
   * Advisory check over every active item. Findings come back in
   * document, item, link order; only a broken hierarchy throws.
   */
  validate(): Finding[] {
    this.assertState("validate", ["loaded"]);
    this.stateValue = "validating";
    try {
      this.assertParentsLoaded();
    } catch (error) {
      this.fail();
      throw error;
    }

    const findings: Finding[] = [];
    for (const document of this.order) {
      for (const item of document.items) {
        if (!item.active) continue;
        for (const targetId of item.links) {
          const target = this.lookup(targetId);
          if (!target) {
            findings.push({
              kind: "unresolved-link",
              severity: "error",
              itemId: item.id,
              targetId,
              detail: this.describeMissing(targetId),
            });
          } else if (this.settings.checkSuspectLinks && item.isLinkSuspect(target)) {
            findings.push({
              kind: "suspect-link",
              severity: "info",
              itemId: item.id,
              targetId,
              detail: `${targetId} changed since the link was made`,
            });
          }
        }
        if (item.stakeholder !== null) {
          const problem = this.checkStakeholder(item.stakeholder);
          if (problem) {
            findings.push({
              kind: "bad-stakeholder",
              severity: "error",
              itemId: item.id,
              targetId: item.stakeholder,
              detail: problem,
            });
          }
        }
      }
    }

    this.stateValue = "loaded";
    return findings;
  }

  addItem(prefix: string, fields: Omit<ItemRecord, "id"> = {}): Item {
    this.assertState("add an item", ["loaded"]);
    const document = this.findDocument(prefix);
    const item = document.addItem(Item.fromRecord({ ...fields, id: document.nextId() }));
    this.stampMissing(item);
    return item;
  }

  removeItem(id: string): Item {
    this.assertState("remove an item", ["loaded"]);
    return this.documentOf(this.findItem(id)).removeItem(id);
  }

  link(childId: string, parentId: string): Item {
    this.assertState("link items", ["loaded"]);
    const child = this.findItem(childId);
    const parent = this.resolveLink(child, parentId);
    child.addLink(parent);
    return child;
  }

  unlink(childId: string, parentId: string): Item {
    this.assertState("unlink items", ["loaded"]);
    const child = this.findItem(childId);
    if (child.hasLink(parentId)) {
      child.removeLink(parentId);
    }
    return child;
  }

  /** Re-captures link fingerprints; returns how many links changed. */
  clearSuspects(id?: string): number {
    this.assertState("clear suspect links", ["loaded"]);
    const items = id === undefined ? this.items() : [this.findItem(id)];
    let changed = 0;
    for (const item of items) {
      for (const targetId of item.links) {
        const target = this.lookup(targetId);
        if (!target || item.linkFingerprint(targetId) === target.fingerprint) continue;
        item.stampLink(target);
        changed += 1;
      }
    }
    return changed;
  }

  draw(): string {
    this.assertReadable("draw");
    const lines: string[] = [];
    const visit = (document: Document, indent: string, connector: string) => {
      lines.push(`${indent}${connector}${document.prefix}`);
      const childIndent = connector === "" ? indent : `${indent}${connector === "└── " ? "    " : "│   "}`;
      const children = this.order.filter((candidate) => candidate.parent === document.prefix);
      children.forEach((child, index) => {
        visit(child, childIndent, index === children.length - 1 ? "└── " : "├── ");
      });
    };
    for (const root of this.order) {
      if (root.parent === null || !this.byPrefix.has(root.parent)) {
        visit(root, "", "");
      }
    }
    return lines.join("\n");
  }

  private lookup(id: string): Item | undefined {
    if (!isValidUid(id)) return undefined;
    const document = this.byPrefix.get(parseUid(id).prefix);
    return document?.has(id) ? document.findItem(id) : undefined;
  }

  private describeMissing(id: string): string {
    if (!isValidUid(id)) return `${id} is not a valid item id`;
    const { prefix } = parseUid(id);
    if (!this.byPrefix.has(prefix)) return `no document with prefix "${prefix}"`;
    return `${id} not found in document ${prefix}`;
  }

  private checkStakeholder(id: string): string | null {
    const target = this.lookup(id);
    if (!target) return this.describeMissing(id);
    const document = this.byPrefix.get(parseUid(id).prefix);
    if (document && document.kind !== "role") {
      return `${id} belongs to ${document.kind} document ${document.prefix}, not a role document`;
    }
    return null;
  }

  private stampMissing(item: Item): void {
    for (const link of item.linkEntries) {
      if (link.fingerprint !== null) continue;
      const target = this.lookup(link.id);
      if (target) item.stampLink(target);
    }
  }

  private ensureIndexes(): void {
    if (this.indexStale) {
      this.rebuildIndexes();
    }
  }

  private rebuildIndexes(): void {
    const children = new Map<string, Item[]>();
    const stakeholders = new Map<string, Item[]>();
    for (const document of this.order) {
      for (const item of document.items) {
        for (const targetId of item.links) {
          pushInto(children, targetId, item);
        }
        if (item.stakeholder !== null) {
          pushInto(stakeholders, item.stakeholder, item);
        }
      }
    }
    this.childIndex = children;
    this.stakeholderIndex = stakeholders;
    this.indexStale = false;
  }

  private assertParentsLoaded(): void {
    for (const document of this.order) {
      if (document.parent !== null && !this.byPrefix.has(document.parent)) {
        throw new InvalidTreeError(`Document ${document.prefix} has unknown parent "${document.parent}"`);
      }
    }
  }

  private assertReadable(operation: string): void {
    this.assertState(operation, ["loaded", "validating"]);
  }

  private assertState(operation: string, allowed: TreeState[]): void {
    if (!allowed.includes(this.stateValue)) {
      throw new TreeStateError(operation, this.stateValue);
    }
  }

  private fail(): void {
    this.clear();
    this.stateValue = "failed";
  }

  private clear(): void {
    for (const document of this.order) {
      document.setChangeListener(null);
    }
    this.order = [];
    this.byPrefix = new Map();
    this.childIndex = new Map();
    this.stakeholderIndex = new Map();
    this.indexStale = true;
  }
}

function assertAcyclic(order: Document[], byPrefix: Map<string, Document>): void {
  const settled = new Set<string>();
  for (const start of order) {
    const path: string[] = [];
    const onPath = new Set<string>();
    let current: Document | undefined = start;
    while (current && !settled.has(current.prefix)) {
      if (onPath.has(current.prefix)) {
        throw new CyclicHierarchyError([...path, current.prefix]);
      }
      onPath.add(current.prefix);
      path.push(current.prefix);
      current = current.parent === null ? undefined : byPrefix.get(current.parent);
    }
    for (const prefix of path) {
      settled.add(prefix);
    }
  }
}
