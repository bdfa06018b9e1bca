const REFERENCE =
  /\b(section|attachment|exhibit|appendix|clause)\s+([A-Za-z0-9][\w.-]*)/gi;

function isReferenceId(id: string): boolean {
  return /\d/.test(id) || /^[A-Z]$/.test(id);
}

/**
 * Section / attachment / exhibit references mentioned in a requirement,
 * de-duplicated in order of first appearance ("see Section C.3." ->
 * "Section C.3").
 */
export function findCrossReferences(text: string): string[] {
  const refs: string[] = [];

  for (const m of text.matchAll(REFERENCE)) {
    const id = m[2].replace(/[.-]+$/, "");
    if (!id || !isReferenceId(id)) continue;

    const keyword = m[1][0].toUpperCase() + m[1].slice(1).toLowerCase();
    const ref = `${keyword} ${id}`;
    if (!refs.includes(ref)) refs.push(ref);
  }

  return refs;
}
