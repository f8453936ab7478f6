/**
 * Collapses whitespace runs, trims, then removes each literal substring in
 * `removeItems`. Substrings are matched verbatim, never as patterns.
 */
export function clean(text: string, removeItems: Iterable<string> = []): string {
  let result = text.replace(/\s+/g, ' ').trim();
  for (const item of removeItems) {
    if (!item) continue;
    result = result.split(item).join('');
  }
  return result;
}
