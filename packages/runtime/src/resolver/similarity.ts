export function normalize(text: string): string {
  return text
    .toLowerCase()
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[’']s\b/g, "")
    .replace(/[^\p{L}\p{N}_\s-]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function tokenize(text: string): string[] {
  return normalize(text)
    .split(/[\s-]+/)
    .filter((token) => token.length > 0);
}

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;
  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (current[j - 1] ?? 0) + 1,
        (previous[j] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost
      );
    }
    previous = current;
  }
  return previous[b.length] ?? Math.max(a.length, b.length);
}

/** 0-1，1 表示完全相同 */
export function ratio(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - levenshtein(a, b) / longest;
}

/**
 * Token-set similarity: compares the shared tokens against each side's
 * remainder, so word order and extra words weigh little.
 */
export function tokenSetRatio(a: string, b: string): number {
  const left = new Set(tokenize(a));
  const right = new Set(tokenize(b));
  const shared = [...left].filter((token) => right.has(token)).sort();
  const onlyLeft = [...left].filter((token) => !right.has(token)).sort();
  const onlyRight = [...right].filter((token) => !left.has(token)).sort();
  const base = shared.join(" ");
  const withLeft = [base, onlyLeft.join(" ")].filter(Boolean).join(" ");
  const withRight = [base, onlyRight.join(" ")].filter(Boolean).join(" ");
  const scores = [ratio(withLeft, withRight)];
  if (base) {
    scores.push(ratio(base, withLeft), ratio(base, withRight));
  }
  return Math.max(...scores);
}
