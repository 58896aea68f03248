import { MalformedIdError } from "./errors.js";

const PREFIX_PATTERN = /^[A-Za-z](?:[A-Za-z0-9_]*[A-Za-z])?$/;
const UID_PATTERN = /^([A-Za-z](?:[A-Za-z0-9_]*?[A-Za-z])?)([-_.]?)(\d+)$/;
const SEPARATORS = new Set(["", "-", "_", "."]);

export const RESERVED_PREFIXES = ["ALL"] as const;

export interface ParsedUid {
  prefix: string;
  sep: string;
  number: number;
}

export function isValidPrefix(prefix: string): boolean {
  return PREFIX_PATTERN.test(prefix);
}

export function isReservedPrefix(prefix: string): boolean {
  return RESERVED_PREFIXES.some((reserved) => reserved === prefix.toUpperCase());
}

export function isValidSeparator(sep: string): boolean {
  return SEPARATORS.has(sep);
}

export function parseUid(id: string): ParsedUid {
  const match = UID_PATTERN.exec(id);
  if (!match) {
    throw new MalformedIdError(id);
  }
  return { prefix: match[1], sep: match[2], number: Number.parseInt(match[3], 10) };
}

export function isValidUid(id: string): boolean {
  return UID_PATTERN.test(id);
}

export function prefixOf(id: string): string {
  return parseUid(id).prefix;
}

export function formatUid(prefix: string, number: number, digits = 3, sep = ""): string {
  return `${prefix}${sep}${number.toString().padStart(digits, "0")}`;
}
