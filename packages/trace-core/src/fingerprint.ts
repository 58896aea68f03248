import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";

import type { ReviewableContent } from "./types.js";

function normalizeText(text: string): string {
  return text.replace(/\r\n?/g, "\n").replace(/[ \t]+$/gm, "").trim();
}

/**
 * Digest of the reviewable part of an item. Link order and trailing
 * whitespace do not count as content.
 */
export function fingerprint(content: ReviewableContent): string {
  const canonical = JSON.stringify({
    id: content.id,
    text: normalizeText(content.text),
    links: [...content.links].sort(),
  });
  return bytesToHex(sha256(utf8ToBytes(canonical)));
}
