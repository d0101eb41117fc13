export type VersionTuple = number[];

const prefix = /^\s*(?:version|ver|v)\s*/i;

const leading = /^(\d+)(?:\.(\d+))?(?:\.(\d+))?/;

/**
 * Leading major[.minor[.patch]] run, missing components as 0. Anything after
 * the numeric run ("-beta", "rc1") is ignored; no numeric run at all gives [0].
 */
export function parseVersion(raw: string): VersionTuple {
  const match = leading.exec(raw.trim().replace(prefix, ""));
  if (!match) return [0];
  return [match[1], match[2], match[3]].map((part) => (part ? Number(part) : 0));
}

export function compareVersions(a: string, b: string): -1 | 0 | 1 {
  const left = parseVersion(a);
  const right = parseVersion(b);
  const len = Math.max(left.length, right.length);
  for (let i = 0; i < len; i += 1) {
    const l = left[i] ?? 0;
    const r = right[i] ?? 0;
    if (l < r) return -1;
    if (l > r) return 1;
  }
  return 0;
}

/** True when `installed` sorts before `safeFrom`; never true for an empty version on either side. */
export function isVersionVulnerable(installed: string, safeFrom: string): boolean {
  if (!installed.trim() || !safeFrom.trim()) return false;
  return compareVersions(installed, safeFrom) < 0;
}
