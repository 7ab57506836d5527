/**
 * Personal-name normalization and matching.
 *
 * Listings pages and the ratings site print the same instructor differently:
 * "Nguyen, Clare", "Clare M. Nguyen", "Christopher N.Bradley", or with the
 * space lost entirely as in "RodericTaylor". Names are reduced to lowercase
 * tokens with middle initials dropped, then compared on first and last token.
 */

const NAME_PREFIXES = new Set(['Mc', 'Mac', "O'", 'De', 'Van', 'Von', 'La', 'Le', 'St', 'Saint']);

/**
 * "MorganMcKnight" -> ["Morgan", "Mc", "Knight"]. Leading lowercase text is dropped.
 */
function splitOnCapitals(text: string): string[] {
  return text.match(/[A-Z][^A-Z]*/g) ?? [];
}

/**
 * ["Morgan", "Mc", "Knight"] -> ["Morgan", "McKnight"]
 */
function mergePrefixes(parts: string[]): string[] {
  const merged: string[] = [];
  let i = 0;
  while (i < parts.length) {
    if (NAME_PREFIXES.has(parts[i]) && i < parts.length - 1) {
      merged.push(parts[i] + parts[i + 1]);
      i += 2;
    } else {
      merged.push(parts[i]);
      i += 1;
    }
  }
  return merged;
}

/**
 * Split a single glued token such as "RodericTaylor" or "rodericMcKnight"
 */
function splitGluedName(token: string): string[] {
  const split = splitOnCapitals(token);
  const parts = split.length >= 2 ? mergePrefixes(split) : [token];
  if (parts.length > 1) return parts;

  const boundary = token.match(/^([a-z]+)([A-Z].*)$/);
  if (!boundary) return parts;

  const rest = splitOnCapitals(boundary[2]);
  return [boundary[1], ...(rest.length >= 2 ? mergePrefixes(rest) : [boundary[2]])];
}

/**
 * Normalize a name into comparable lowercase tokens.
 *
 * "Roderic (Rick)Taylor" -> ["roderic", "taylor"]
 * "Christopher N.Bradley" -> ["christopher", "bradley"]
 * "Nguyen, Clare" -> ["nguyen", "clare"]
 */
export function normalizeName(name: string): string[] {
  const cleaned = name
    .replace(/\([^)]*\)/g, ' ')
    .replace(/,/g, ' ')
    .replace(/\.([A-Z])/g, ' $1');

  let parts = cleaned.split(/\s+/).filter(part => part.length > 0);
  if (parts.length === 1) {
    parts = splitGluedName(parts[0]);
  }

  const tokens = parts
    .map(part => part.toLowerCase().replace(/\./g, '').trim())
    .filter(token => token.length > 0);

  // Single letters between first and last are middle initials
  return tokens.filter(
    (token, index) => token.length > 1 || index === 0 || index === tokens.length - 1
  );
}

/**
 * Strict match on first and last name, in either order.
 *
 * "Clare Nguyen" matches "Clare M. Nguyen" and "Nguyen, Clare",
 * but not "John Nguyen".
 */
export function matchProfessorName(searchName: string, candidateName: string): boolean {
  const search = normalizeName(searchName);
  const candidate = normalizeName(candidateName);
  if (search.length < 2 || candidate.length < 2) return false;

  const searchFirst = search[0];
  const searchLast = search[search.length - 1];
  const candidateFirst = candidate[0];
  const candidateLast = candidate[candidate.length - 1];

  if (searchFirst === candidateFirst && searchLast === candidateLast) return true;

  // "Last, First" on one side only
  return searchFirst === candidateLast && searchLast === candidateFirst;
}
