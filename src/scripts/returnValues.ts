export const RETURN_VALUE_SENTINEL = "cloudomatethecloudgarage_return_value";

export type MalformedReturnValue = {
  line: string;
  lineNumber: number;
  reason: "missing_separator" | "empty_key";
};

/**
 * Collects `<sentinel> key = value` lines from script stdout. Later keys overwrite earlier
 * ones. Lines that carry the sentinel but no usable `key=value` are skipped and reported.
 */
export function extractReturnValues(
  lines: readonly string[],
  onMalformed?: (entry: MalformedReturnValue) => void
): Record<string, string> {
  const values: Record<string, string> = {};

  lines.forEach((line, index) => {
    if (!line.startsWith(RETURN_VALUE_SENTINEL)) return;
    const body = line.slice(RETURN_VALUE_SENTINEL.length);
    const separator = body.indexOf("=");
    if (separator === -1) {
      onMalformed?.({ line, lineNumber: index + 1, reason: "missing_separator" });
      return;
    }
    const key = body.slice(0, separator).trim();
    if (!key) {
      onMalformed?.({ line, lineNumber: index + 1, reason: "empty_key" });
      return;
    }
    values[key] = body.slice(separator + 1).trim();
  });

  return values;
}
