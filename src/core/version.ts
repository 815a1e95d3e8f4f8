export type VersionToken =
  | { kind: "numeric"; value: bigint }
  | { kind: "alpha"; value: string };

const KIND_ORDER: Record<VersionToken["kind"], number> = {
  numeric: 0,
  alpha: 1
};

/**
 * Strips parenthesised build metadata such as `" (18619.1.26.111.1)"` and
 * surrounding whitespace.
 */
export function normalizeVersion(raw: string | null | undefined): string {
  return (raw ?? "").trim().replace(/\(.*?\)/g, "").trim();
}

export function tokenizeVersion(version: string): VersionToken[] {
  const parts = version.match(/\d+|[A-Za-z]+/g) ?? [];
  return parts.map((part) =>
    /^\d+$/.test(part)
      ? { kind: "numeric", value: BigInt(part) }
      : { kind: "alpha", value: part.toLowerCase() }
  );
}

function compareTokens(left: VersionToken, right: VersionToken): number {
  if (left.kind !== right.kind) {
    return KIND_ORDER[left.kind] - KIND_ORDER[right.kind];
  }
  if (left.kind === "numeric" && right.kind === "numeric") {
    return left.value === right.value ? 0 : left.value < right.value ? -1 : 1;
  }
  if (left.kind === "alpha" && right.kind === "alpha") {
    return left.value === right.value ? 0 : left.value < right.value ? -1 : 1;
  }
  return 0;
}

/**
 * Orders two versions by their token sequences, pair by pair; a sequence
 * that is a strict prefix of the other sorts first.
 *
 * This is an approximation of semantic-version precedence. Because a shorter
 * prefix sorts first, trailing zeros count (`1.2` sorts before `1.2.0`), and
 * pre-release labels are not ranked below releases (`1.0.0-beta` sorts after
 * `1.0.0`). Digit runs are compared as integers of any length.
 */
export function compareVersions(left: string, right: string): number {
  const a = tokenizeVersion(normalizeVersion(left));
  const b = tokenizeVersion(normalizeVersion(right));

  for (const [index, token] of a.entries()) {
    const other = b[index];
    if (other === undefined) {
      return 1;
    }
    const result = compareTokens(token, other);
    if (result !== 0) {
      return result;
    }
  }
  return a.length < b.length ? -1 : 0;
}

/** True when `candidate` meets the `baseline` floor; an empty baseline has no floor. */
export function isAtLeast(candidate: string | null | undefined, baseline: string | null | undefined): boolean {
  const floor = normalizeVersion(baseline);
  if (!floor) {
    return true;
  }
  const installed = normalizeVersion(candidate);
  if (!installed) {
    return false;
  }
  return compareVersions(installed, floor) >= 0;
}
