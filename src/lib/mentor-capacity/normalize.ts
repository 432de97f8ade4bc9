/**
 * Name normalization shared by the counts feed, the decision pass and the patcher.
 */

const COMBINING_MARKS = /[\u0300-\u036f]/g;

/** Strip diacritics, trim, lowercase, collapse whitespace. */
export function normalizeText(s: string | null | undefined): string {
  if (s == null) return "";
  const ascii = String(s).normalize("NFD").replace(COMBINING_MARKS, "");
  return ascii.trim().toLowerCase().split(/\s+/).filter(Boolean).join(" ");
}

export function normalizeName(s: string | null | undefined): string {
  return normalizeText(s);
}

/** Integer when the trimmed string form is an optional sign plus digits. */
export function toInt(value: unknown): number | null {
  if (value == null || typeof value === "boolean") return null;
  const s = String(value).trim();
  if (!/^[+-]?\d+$/.test(s)) return null;
  return parseInt(s, 10);
}

/** List of months from a YAML list, a comma-separated string or a single scalar. */
export function toIntList(value: unknown): number[] {
  if (value == null) return [];
  if (Array.isArray(value)) {
    const out: number[] = [];
    for (const v of value) {
      const n = toInt(v);
      if (n !== null) out.push(n);
    }
    return out;
  }
  if (typeof value === "string") {
    return toIntList(value.split(","));
  }
  const n = toInt(value);
  return n !== null ? [n] : [];
}
