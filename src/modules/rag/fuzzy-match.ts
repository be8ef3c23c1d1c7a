const MIN_SUBSTRING_TOKEN_LENGTH = 3;

export const tokenize = (value: string): string[] =>
  value
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);

export const levenshteinDistance = (a: string, b: string): number => {
  if (a === b) {
    return 0;
  }
  if (a.length === 0) {
    return b.length;
  }
  if (b.length === 0) {
    return a.length;
  }

  let previous = Array.from({ length: b.length + 1 }, (_, index) => index);
  for (let i = 1; i <= a.length; i += 1) {
    const current = [i];
    for (let j = 1; j <= b.length; j += 1) {
      const substitution = previous[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1);
      current.push(Math.min(previous[j] + 1, current[j - 1] + 1, substitution));
    }
    previous = current;
  }
  return previous[b.length];
};

/** 1 for identical tokens, 0 for tokens sharing nothing. */
export const tokenSimilarity = (a: string, b: string): number => {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) {
    return 1;
  }
  return 1 - levenshteinDistance(a, b) / longest;
};

export const tokensMatch = (a: string, b: string, threshold: number): boolean => {
  if (a === b) {
    return true;
  }
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  if (shorter.length >= MIN_SUBSTRING_TOKEN_LENGTH && longer.includes(shorter)) {
    return true;
  }
  return tokenSimilarity(a, b) >= threshold;
};

/**
 * True when every token of `value` matches some token of `field`.
 * Case-insensitive; a value without tokens never matches.
 */
export const fuzzyMatches = (value: string, field: string | readonly string[], threshold: number): boolean => {
  const valueTokens = tokenize(value);
  const fieldTokens = (typeof field === "string" ? [field] : field).flatMap(tokenize);
  if (valueTokens.length === 0 || fieldTokens.length === 0) {
    return false;
  }
  return valueTokens.every((token) => fieldTokens.some((candidate) => tokensMatch(token, candidate, threshold)));
};
