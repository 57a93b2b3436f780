/**
 * JSON text decoding shared by the service client and the cache file reader.
 */

/**
 * Parse a JSON string into a JavaScript value. A leading BOM is ignored;
 * anything else that is not strict JSON is rejected.
 */
export function parseJson(input: string): unknown {
  let cleaned = input.trim();
  if (cleaned.charCodeAt(0) === 0xfeff) {
    cleaned = cleaned.substring(1);
  }

  try {
    return JSON.parse(cleaned);
  } catch (error) {
    throw new Error(
      `Failed to parse JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
