export type LwwDecision = "take-remote" | "keep-local" | "identical" | "conflict";

/** Orders ISO-8601 timestamps by instant, not by string. */
export function compareTimestamps(a: string, b: string): number {
  const left = Date.parse(a);
  const right = Date.parse(b);
  if (Number.isNaN(left) || Number.isNaN(right)) {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  return left - right;
}

/**
 * Last-writer-wins on `updatedAt`. A strictly newer remote wins; an older one
 * leaves local alone. On an exact tie local is kept, and differing content is
 * reported as a conflict so the caller can preserve the remote version.
 */
export function resolveLww(
  localUpdatedAt: string | null,
  remoteUpdatedAt: string,
  sameContent: boolean,
): LwwDecision {
  if (localUpdatedAt === null) return "take-remote";
  const order = compareTimestamps(remoteUpdatedAt, localUpdatedAt);
  if (order > 0) return "take-remote";
  if (order < 0) return "keep-local";
  return sameContent ? "identical" : "conflict";
}
