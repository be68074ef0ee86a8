/** Case- and accent-folded form of a label, for matching only. */
export function normalizeForSearch(input: string): string {
  return input
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/\s+/g, " ")
    .trim();
}

const LEADING_ARTICLE = /^(the|a|an) /;

/** Sort key for alphabetical ordering: folded, without a leading article. */
export function normalizeTitle(input: string | null | undefined): string {
  if (!input) return "";
  return normalizeForSearch(input).replace(LEADING_ARTICLE, "");
}

export function searchTerms(query: string): string[] {
  const folded = normalizeForSearch(query);
  return folded ? folded.split(" ") : [];
}

/** True when every whitespace-separated term of `needle` occurs in `haystack`. */
export function includesNormalized(haystack: string, needle: string): boolean {
  const terms = searchTerms(needle);
  if (terms.length === 0) return true;
  const folded = normalizeForSearch(haystack);
  return terms.every((term) => folded.includes(term));
}
