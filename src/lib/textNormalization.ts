const INVISIBLE_CHARACTERS = /[\uFEFF\u200B-\u200D\u2060]/g;
const DASH_VARIANTS = /[\u2010-\u2015\u2212]/g;

/** Cleans scraped policy text into one trimmed line with plain ASCII dashes. */
export function normalizePolicyText(value: string): string {
  return value
    .replace(INVISIBLE_CHARACTERS, "")
    .replace(DASH_VARIANTS, "-")
    .replace(/\s+/g, " ")
    .trim();
}

export function truncateWithEllipsis(value: string, maxChars: number): string {
  if (value.length <= maxChars) {
    return value;
  }

  return `${value.slice(0, Math.max(0, maxChars)).trimEnd()}...`;
}

export function toStringOrNull(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function toStringList(raw: unknown): string[] {
  if (typeof raw === "string") {
    const single = raw.trim();
    return single ? [single] : [];
  }

  if (Array.isArray(raw)) {
    return raw
      .filter((value): value is string => typeof value === "string")
      .map((value) => value.trim())
      .filter((value) => value.length > 0);
  }

  return [];
}
