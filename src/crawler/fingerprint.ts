import { createHash } from "node:crypto";

/**
 * SHA-256 over the page text with runs of whitespace collapsed, so
 * re-flowed but otherwise identical text keeps its fingerprint.
 */
export function computeFingerprint(text: string): string {
  const canonical = text.replace(/\s+/g, " ").trim();
  return createHash("sha256").update(canonical, "utf8").digest("hex");
}

export function hasChanged(previous: string | null | undefined, next: string): boolean {
  return previous == null || previous !== next;
}
