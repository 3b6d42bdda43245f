import type { CaseRecord, LinkEntry, LinkSlotValue } from './types.js';

/**
 * Validates a single token as an http(s) URL.
 * Returns the normalized href, or the reason it was rejected.
 */
export function validateUrl(token: string): { ok: true; url: string } | { ok: false; reason: string } {
  let parsed: URL;
  try {
    parsed = new URL(token);
  } catch {
    return { ok: false, reason: 'not a well-formed URL' };
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return { ok: false, reason: `unsupported protocol ${parsed.protocol}` };
  }
  return { ok: true, url: parsed.href };
}

/**
 * Splits a free-text field on whitespace runs and drops empty tokens.
 */
export function splitMultiUrlField(text: string): string[] {
  return text.split(/\s+/).filter(token => token.length > 0);
}

function toEntry(slot: string, token: string): LinkEntry {
  const result = validateUrl(token);
  if (result.ok) return { kind: 'valid', slot, url: result.url };
  return { kind: 'malformed', slot, token, reason: result.reason };
}

/**
 * Builds the ordered, deduplicated Download Link Set from raw slot values.
 * Every slot is tokenized the same way, so a fixed slot holding stray
 * whitespace still yields its single URL.
 */
export function buildLinkSet(slots: readonly LinkSlotValue[]): LinkEntry[] {
  const seen = new Set<string>();
  const entries: LinkEntry[] = [];

  for (const { slot, value } of slots) {
    for (const token of splitMultiUrlField(value)) {
      const entry = toEntry(slot, token);
      const key = entry.kind === 'valid' ? entry.url : entry.token;
      if (seen.has(key)) continue;
      seen.add(key);
      entries.push(entry);
    }
  }

  return entries;
}

export function buildDownloadLinkSet(record: Pick<CaseRecord, 'linkSlots'>): LinkEntry[] {
  return buildLinkSet(record.linkSlots);
}
