import { DuplicateItemError, InvalidTreeError, ItemNotFoundError, MalformedIdError } from "./errors.js";
import { Item, type ChangeListener } from "./item.js";
import { DEFAULT_SETTINGS, classifyPrefix, type TraceSettings } from "./settings.js";
import { formatUid, isReservedPrefix, isValidPrefix, isValidSeparator, parseUid } from "./uid.js";
import type { DocumentKind, DocumentRecord } from "./types.js";

export interface DocumentOptions {
  parent?: string | null;
  name?: string;
  level?: string;
  digits?: number;
  sep?: string;
  settings?: TraceSettings;
}

export class Document {
  readonly prefix: string;
  readonly parent: string | null;
  name: string;
  level: string;
  readonly digits: number;
  readonly sep: string;
  private readonly settings: TraceSettings;
  private readonly order: string[] = [];
  private readonly byId = new Map<string, Item>();
  private changeListener: ChangeListener | null = null;

  constructor(prefix: string, options: DocumentOptions = {}) {
    if (!isValidPrefix(prefix)) {
      throw new InvalidTreeError(`Invalid document prefix "${prefix}"`);
    }
    if (isReservedPrefix(prefix)) {
      throw new InvalidTreeError(`Document prefix "${prefix}" is reserved`);
    }
    this.settings = options.settings ?? DEFAULT_SETTINGS;
    this.prefix = prefix;
    this.parent = options.parent ?? null;
    this.name = options.name ?? prefix;
    this.level = options.level ?? "1.0";
    this.digits = options.digits ?? this.settings.items.digits;
    this.sep = options.sep ?? this.settings.items.sep;
    if (!isValidSeparator(this.sep)) {
      throw new InvalidTreeError(`Invalid item separator "${this.sep}" for document ${prefix}`);
    }
  }

  static fromRecord(record: DocumentRecord, settings?: TraceSettings): Document {
    const document = new Document(record.prefix, {
      parent: record.parent,
      name: record.name,
      level: record.level,
      digits: record.digits,
      sep: record.sep,
      settings,
    });
    for (const item of record.items ?? []) {
      document.addItem(Item.fromRecord(item));
    }
    return document;
  }

  get items(): Item[] {
    return this.order.map((id) => this.findItem(id));
  }

  get size(): number {
    return this.order.length;
  }

  get isRoot(): boolean {
    return this.parent === null;
  }

  get kind(): DocumentKind {
    return this.classify();
  }

  classify(): DocumentKind {
    return classifyPrefix(this.prefix, this.settings);
  }

  /** Called when an item is added or removed, or when an owned item's links change. */
  setChangeListener(listener: ChangeListener | null): void {
    this.changeListener = listener;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  addItem(item: Item): Item {
    if (parseUid(item.id).prefix !== this.prefix) {
      throw new MalformedIdError(item.id, `prefix does not belong to document ${this.prefix}`);
    }
    if (this.byId.has(item.id)) {
      throw new DuplicateItemError(item.id, this.prefix);
    }
    this.byId.set(item.id, item);
    this.order.push(item.id);
    item.setChangeListener(() => this.notifyChange());
    this.notifyChange();
    return item;
  }

  /** Links pointing at the removed item are left for tree validation to report. */
  removeItem(id: string): Item {
    const item = this.findItem(id);
    this.byId.delete(id);
    this.order.splice(this.order.indexOf(id), 1);
    item.setChangeListener(null);
    this.notifyChange();
    return item;
  }

  findItem(id: string): Item {
    const item = this.byId.get(id);
    if (!item) {
      throw new ItemNotFoundError(id, this.prefix);
    }
    return item;
  }

  nextId(): string {
    let highest = 0;
    for (const id of this.order) {
      highest = Math.max(highest, parseUid(id).number);
    }
    return formatUid(this.prefix, highest + 1, this.digits, this.sep);
  }

  toString(): string {
    return this.prefix;
  }

  private notifyChange(): void {
    this.changeListener?.();
  }
}
