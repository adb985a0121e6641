function titleCaseWord(word: string): string {
  const [first = "", ...rest] = Array.from(word.toLowerCase());
  const upper = first.toUpperCase();
  // "ß" -> "SS" would not survive a second pass, so such letters stay as they are.
  const head = upper.length === first.length ? upper : first;
  return head + rest.join("");
}

/**
 * Canonical client name: whitespace runs collapsed, ends trimmed, each word title-cased.
 * Two inputs with the same result are the same client for grouping, ledger keys and display.
 */
export function normalizeClient(raw: string | null | undefined): string {
  if (!raw) return "";
  return raw
    .split(/\s+/)
    .filter((w) => w.length > 0)
    .map(titleCaseWord)
    .join(" ");
}
