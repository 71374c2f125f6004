/**
 * Raw query parameter access.
 *
 * URLSearchParams turns '+' into a space, which corrupts base64 values, so
 * items are split and percent-decoded here instead. Names match exactly and
 * the first occurrence of a name wins.
 */

function decodeComponent(value: string): string | undefined {
  try {
    return decodeURIComponent(value);
  } catch {
    return undefined;
  }
}

/**
 * Value of the first query item named `name`.
 *
 * Returns undefined when the item is missing, has no '=' or carries a
 * malformed percent escape.
 */
export function getQueryParameter(url: URL, name: string): string | undefined {
  const query = url.search.slice(1);
  if (!query) return undefined;

  for (const item of query.split('&')) {
    if (!item) continue;
    const eq = item.indexOf('=');
    const itemName = decodeComponent(eq === -1 ? item : item.slice(0, eq));
    if (itemName !== name) continue;
    return eq === -1 ? undefined : decodeComponent(item.slice(eq + 1));
  }

  return undefined;
}

/**
 * Collect the named parameters that carry a value.
 */
export function readQueryParameters<T extends string>(
  url: URL,
  names: readonly T[],
): Partial<Record<T, string>> {
  const params: Partial<Record<T, string>> = {};
  for (const name of names) {
    const value = getQueryParameter(url, name);
    if (value !== undefined) params[name] = value;
  }
  return params;
}
