export type TitlePatternTable = Readonly<{
  exclude: readonly RegExp[];
  allow: readonly RegExp[];
}>;

// Specialty shifts that never trade, whatever slot vocabulary they also carry.
const EXCLUDE_TITLE_PATTERNS: RegExp[] = [
  /trauma/i,
  /ultrasound/i,
  /\bUS\b/i,
  /sick\s*call/i,
];

const ALLOW_TITLE_PATTERNS: RegExp[] = [
  /\bday\s*[- ]?\s*([123])\b/i,
  /\bd([123])\b/i,
  /\beve?(ning)?\s*[- ]?\s*([123])\b/i,
  /\be([123])\b/i,
  /\bnight\s*[- ]?\s*([123])\b/i,
  /\bn([123])\b/i,
  /\bpod\s*[- ]?\s*a\s*[- ]?\s*([12])\b/i,
  /\bpod\s*[- ]?\s*b\s*[- ]?\s*([12])\b/i,
  /\bpoda\s*[- ]?\s*([12])\b/i,
  /\bpodb\s*[- ]?\s*([12])\b/i,
  /\bside\b/i,
  /\b([abc])\s*([12])\b/i,
];

export const DEFAULT_TITLE_PATTERNS: TitlePatternTable = {
  exclude: EXCLUDE_TITLE_PATTERNS,
  allow: ALLOW_TITLE_PATTERNS,
};

export function classifyTitle(
  title: string | null | undefined,
  table: TitlePatternTable = DEFAULT_TITLE_PATTERNS,
): boolean {
  if (!title) {
    return false;
  }
  if (table.exclude.some((pattern) => pattern.test(title))) {
    return false;
  }
  return table.allow.some((pattern) => pattern.test(title));
}

export function createTitleClassifier(table: TitlePatternTable): (title: string) => boolean {
  const frozen: TitlePatternTable = {
    exclude: [...table.exclude],
    allow: [...table.allow],
  };
  return (title) => classifyTitle(title, frozen);
}

export function compileTitlePatterns(source: {
  exclude: readonly string[];
  allow: readonly string[];
}): TitlePatternTable {
  return {
    exclude: source.exclude.map((pattern) => new RegExp(pattern, 'i')),
    allow: source.allow.map((pattern) => new RegExp(pattern, 'i')),
  };
}
