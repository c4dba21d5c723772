/**
 * Decode JSON content without throwing. Returns undefined for non-JSON text.
 */
export function decodeJson(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch {
    return undefined; // raw text
  }
}
