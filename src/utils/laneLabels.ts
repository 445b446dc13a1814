const TITLE_CASE_PATTERN = /\b\w/g;

export function formatLaneLabel(
  laneId: number | null | undefined,
  laneNames?: Record<number, string | undefined>,
  fallback = "--"
): string {
  if (laneId === null || laneId === undefined) {
    return fallback;
  }
  const name = laneNames?.[laneId]?.trim();
  if (!name) {
    return `Lane ${laneId}`;
  }
  const normalized = name.replace(/[_.-]+/g, " ").replace(/\s+/g, " ");
  return normalized.replace(TITLE_CASE_PATTERN, (char) => char.toUpperCase());
}
