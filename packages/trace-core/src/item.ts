import { InvalidLinkError } from "./errors.js";
import { fingerprint } from "./fingerprint.js";
import { isValidUid, parseUid } from "./uid.js";
import type { ItemRecord, LinkInput, LinkRecord, ReviewableContent, RiskRating } from "./types.js";

export interface ItemLink {
  id: string;
  /** Fingerprint of the target when the link was made; null until captured. */
  fingerprint: string | null;
}

export type ChangeListener = () => void;

export class Item {
  readonly id: string;
  text: string;
  prio: number | null;
  implemented: boolean;
  jira: string[];
  active: boolean;
  riskRating: RiskRating | null;
  residualRiskRating: RiskRating | null;
  private stakeholderId: string | null;
  private readonly linkMap = new Map<string, ItemLink>();
  private changeListener: ChangeListener | null = null;

  constructor(id: string, fields: Omit<ItemRecord, "id" | "links"> = {}) {
    parseUid(id);
    this.id = id;
    this.text = fields.text ?? "";
    this.stakeholderId = fields.stakeholder ?? null;
    this.prio = fields.prio ?? null;
    this.implemented = fields.implemented ?? false;
    this.jira = [...(fields.jira ?? [])];
    this.active = fields.active ?? true;
    this.riskRating = fields.riskRating ? { ...fields.riskRating } : null;
    this.residualRiskRating = fields.residualRiskRating ? { ...fields.residualRiskRating } : null;
  }

  static fromRecord(record: ItemRecord): Item {
    const { id, links, ...fields } = record;
    const item = new Item(id, fields);
    for (const link of links ?? []) {
      item.restoreLink(link);
    }
    return item;
  }

  get stakeholder(): string | null {
    return this.stakeholderId;
  }

  set stakeholder(id: string | null) {
    this.stakeholderId = id;
    this.notifyChange();
  }

  /**
   * Called whenever the item's links or stakeholder change. The owning
   * document installs one; a second owner replaces the first.
   */
  setChangeListener(listener: ChangeListener | null): void {
    this.changeListener = listener;
  }

  get links(): string[] {
    return Array.from(this.linkMap.keys());
  }

  get linkEntries(): ItemLink[] {
    return Array.from(this.linkMap.values(), (link) => ({ ...link }));
  }

  get content(): ReviewableContent {
    return { id: this.id, text: this.text, links: this.links };
  }

  get fingerprint(): string {
    return fingerprint(this.content);
  }

  hasLink(targetId: string): boolean {
    return this.linkMap.has(targetId);
  }

  linkFingerprint(targetId: string): string | null {
    return this.linkMap.get(targetId)?.fingerprint ?? null;
  }

  /**
   * Adds an outgoing link. Passing the target item captures its fingerprint
   * now; passing an id leaves the fingerprint unset. Whether the id exists is
   * for the tree to decide.
   */
  addLink(target: Item | string): void {
    const targetId = typeof target === "string" ? target : target.id;
    this.assertLinkable(targetId);
    this.linkMap.set(targetId, {
      id: targetId,
      fingerprint: typeof target === "string" ? null : target.fingerprint,
    });
    this.notifyChange();
  }

  removeLink(targetId: string): void {
    if (this.linkMap.delete(targetId)) {
      this.notifyChange();
    }
  }

  stampLink(target: Item): boolean {
    const existing = this.linkMap.get(target.id);
    if (!existing) return false;
    existing.fingerprint = target.fingerprint;
    return true;
  }

  isLinkSuspect(target: Item): boolean {
    const stored = this.linkMap.get(target.id)?.fingerprint;
    if (!stored) return false;
    return stored !== target.fingerprint;
  }

  equals(other: Item | null | undefined): boolean {
    return other !== null && other !== undefined && other.id === this.id;
  }

  toRecord(): ItemRecord {
    const links: LinkRecord[] = this.linkEntries.map((link) => ({ id: link.id, fingerprint: link.fingerprint }));
    return {
      id: this.id,
      text: this.text,
      links,
      stakeholder: this.stakeholder,
      prio: this.prio,
      implemented: this.implemented,
      jira: [...this.jira],
      active: this.active,
      riskRating: this.riskRating ? { ...this.riskRating } : null,
      residualRiskRating: this.residualRiskRating ? { ...this.residualRiskRating } : null,
    };
  }

  toString(): string {
    return this.id;
  }

  private restoreLink(link: LinkInput): void {
    if (typeof link === "string") {
      this.addLink(link);
      return;
    }
    this.assertLinkable(link.id);
    this.linkMap.set(link.id, { id: link.id, fingerprint: link.fingerprint ?? null });
  }

  private notifyChange(): void {
    this.changeListener?.();
  }

  private assertLinkable(targetId: string): void {
    if (targetId === this.id) {
      throw new InvalidLinkError(this.id, targetId, "an item cannot link to itself");
    }
    if (!isValidUid(targetId)) {
      throw new InvalidLinkError(this.id, targetId, "malformed item id");
    }
  }
}
