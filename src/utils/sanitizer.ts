/**
 * Normalizes an AOI label used as a storage path segment.
 * Rules:
 * - Leading "DrySpy_AOI_" or "AOI_" prefix removed
 * - Trailing compass suffix (_central, _north, _south, _east, _west) removed
 */
export function normalizeAoiName(rawName: string): string {
  return rawName
    .replace(/^(DrySpy_)?AOI_/, "")
    .replace(/_(central|north|south|east|west)$/i, "");
}

/**
 * Basename of a result file name, safe to join under a destination root.
 * Path separators of either style are stripped; "." and ".." never survive.
 */
export function safeBasename(name: string | undefined | null): string {
  if (!name) return "file";

  const parts = name.split(/[\\/]/);
  const base = parts.pop() || "";

  if (!base || base === "." || base === "..") return "file";

  return base;
}

/** A label used as one path segment: separators replaced, dot segments refused. */
export function safePathSegment(segment: string): string {
  const cleaned = segment.replace(/[\\/]/g, "_");
  if (!cleaned || cleaned === "." || cleaned === "..") return "_";
  return cleaned;
}
