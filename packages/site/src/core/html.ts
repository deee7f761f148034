/**
 * Serialize a value for a <script> block: JSON with "</" broken up so the
 * data cannot close the tag.
 */
export function scriptJson(value: unknown): string {
  return JSON.stringify(value).replace(/<\//g, '<\\/');
}
