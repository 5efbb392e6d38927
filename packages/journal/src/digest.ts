/**
 * Journal digest.
 *
 * SHA-256 over the RFC 8785 (JCS) canonical form of the journal. Two
 * runs over identical input produce the same digest.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { JournalEntry } from "./types.js";

export function journalDigest(entries: readonly JournalEntry[]): string {
  return createHash("sha256").update(canonicalize(entries)).digest("hex");
}
