const OBLIGATION = /\b(?:shall|must|will\s+be\s+required\s+to)\b/i;

/**
 * True when the text carries binding modal language ("shall", "must",
 * "will be required to") as whole words. "shallow" does not count.
 */
export function isObligation(text: string): boolean {
  return OBLIGATION.test(text);
}
