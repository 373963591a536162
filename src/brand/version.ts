import semver from "semver";

export const INITIAL_VERSION = "1.0.0";

// Top-level sections whose change bumps the minor version.
export const MAJOR_IMPACT_SECTIONS: ReadonlySet<string> = new Set([
  "colors",
  "typography",
  "assets",
  "compliance",
]);

const FALLBACK_BUMPED_VERSION = "1.1.0";
const STRICT_VERSION = /^\d+\.\d+\.\d+$/;

export function isMajorImpactChange(
  changedSections: Iterable<string>,
  impactSections: ReadonlySet<string> = MAJOR_IMPACT_SECTIONS,
): boolean {
  for (const section of changedSections) {
    if (impactSections.has(section)) return true;
  }
  return false;
}

/**
 * Only the minor component ever moves; major and patch are carried over.
 * A malformed current version is replaced by 1.1.0 when a bump is due.
 */
export function nextVersion(
  current: string,
  changedSections: Iterable<string>,
  impactSections: ReadonlySet<string> = MAJOR_IMPACT_SECTIONS,
): string {
  if (!isMajorImpactChange(changedSections, impactSections)) {
    return current;
  }

  const parsed = STRICT_VERSION.test(current) ? semver.parse(current) : null;
  if (!parsed) {
    return FALLBACK_BUMPED_VERSION;
  }
  return `${parsed.major}.${parsed.minor + 1}.${parsed.patch}`;
}
