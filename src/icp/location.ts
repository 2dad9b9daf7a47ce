/**
 * State extraction from a free-form address
 */

// First whitespace-separated token (upper-cased) that is a known state code
export function extractState(address: string | null | undefined, states: Iterable<string>): string {
  if (!address) {
    return '';
  }

  const known = states instanceof Set ? states : new Set(states);
  for (const word of address.toUpperCase().split(/\s+/)) {
    if (known.has(word)) {
      return word;
    }
  }
  return '';
}
