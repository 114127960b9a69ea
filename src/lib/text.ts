/**
 * Cuts a value down to a fixed-width column, counting code points as varchar does, so a
 * surrogate pair is never split. Null, undefined and empty input become ''.
 */
export function truncateText(value: string | number | null | undefined, maxLength: number): string {
  if (value === null || value === undefined) return '';
  const text = String(value);
  if (maxLength <= 0) return '';
  if (text.length <= maxLength) return text;
  const codePoints = Array.from(text);
  return codePoints.length > maxLength ? codePoints.slice(0, maxLength).join('') : text;
}

export function joinNonEmpty(parts: Array<string | null | undefined>, separator = ' '): string {
  return parts
    .map((part) => (part ?? '').trim())
    .filter(Boolean)
    .join(separator);
}
