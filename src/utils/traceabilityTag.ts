const TAG_PREFIX = "Imported from Height";

// Linear escapes brackets when it round-trips markdown.
const TAG_PATTERN = /\\?\[Imported from Height: (T-\d+)\\?\]/;

export function toHeightId(index: number): string {
  return `T-${index}`;
}

export function buildTraceabilityTag(heightId: string): string {
  return `[${TAG_PREFIX}: ${heightId}]`;
}

export function extractHeightId(
  description: string | null | undefined
): string | undefined {
  if (!description) return undefined;
  const m = description.match(TAG_PATTERN);
  return m ? m[1] : undefined;
}
