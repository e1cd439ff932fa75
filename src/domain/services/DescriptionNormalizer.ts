const repeatingWhitespace = /\s+/g;
const punctuation = /[^\w\s]/g;

/** Lowercased, punctuation-free form used for keyword matching. */
export const normalizeDescription = (input: string): string =>
  collapseWhitespace(input.normalize('NFKD').replace(punctuation, ' ')).toLowerCase();

/**
 * Normalized text padded with spaces, so that `haystack.includes(needle)` only matches
 * whole tokens: " cvs " is found in " cvs pharmacy " but " bus " is not in " business ".
 */
export const toTokenText = (input: string): string => ` ${normalizeDescription(input)} `;

export const collapseWhitespace = (input: string): string => input.replace(repeatingWhitespace, ' ').trim();
