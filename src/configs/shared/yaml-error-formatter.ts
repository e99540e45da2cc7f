import type { YamlParseErrorDetail } from "../../utils/yaml-reader.js";

/**
 * `(line X, column Y): reason` when the parser reported a location,
 * otherwise the reason alone.
 */
export function formatYamlErrorDetail(detail: YamlParseErrorDetail): string {
  const hasLocation =
    typeof detail.line === "number" && typeof detail.column === "number";

  if (hasLocation) {
    return `(line ${detail.line}, column ${detail.column}): ${detail.reason}`;
  }

  return detail.reason;
}
