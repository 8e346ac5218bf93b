import { createHash } from 'node:crypto';

export type ShiftKeyParts = {
  owner: string;
  startISO: string;
  endISO: string;
  title: string;
};

export type DecodedShiftKey = {
  owner: string;
  startISO: string;
  endISO: string;
  titleDigest: string;
};

const SEPARATOR = '|';
const TITLE_DIGEST_LENGTH = 16;

export function titleDigest(title: string): string {
  return createHash('sha256').update(title, 'utf8').digest('hex').slice(0, TITLE_DIGEST_LENGTH);
}

/**
 * Deterministic id for a shift. The owner is URI-encoded so a separator inside a
 * name cannot shift the fields; the title is reduced to a digest so free text
 * never leaks into the key.
 */
export function encodeShiftKey(parts: ShiftKeyParts): string {
  return [
    encodeURIComponent(parts.owner),
    parts.startISO,
    parts.endISO,
    titleDigest(parts.title),
  ].join(SEPARATOR);
}

export function decodeShiftKey(id: string): DecodedShiftKey | null {
  const segments = id.split(SEPARATOR);
  if (segments.length !== 4) {
    return null;
  }
  const [owner, startISO, endISO, digest] = segments;
  if (!owner || !startISO || !endISO || !digest || digest.length !== TITLE_DIGEST_LENGTH) {
    return null;
  }
  try {
    return { owner: decodeURIComponent(owner), startISO, endISO, titleDigest: digest };
  } catch {
    return null;
  }
}
