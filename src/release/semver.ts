import { ReleaseError, StepResult, fail, ok } from './errors';

/**
 * A strict `major.minor.patch` version. No pre-release or build suffix.
 */
export interface Version {
  major: number;
  minor: number;
  patch: number;
}

export interface VersionBump {
  from: string;
  to: string;
}

const PART_REGEX = /^\d+$/;

/**
 * Parse a version string. Returns null unless it is exactly three
 * dot-separated runs of digits.
 */
export function parseVersion(text: string): Version | null {
  const parts = text.trim().split('.');
  if (parts.length !== 3 || !parts.every((part) => PART_REGEX.test(part))) {
    return null;
  }

  const [major, minor, patch] = parts.map((part) => parseInt(part, 10));
  if (![major, minor, patch].every(Number.isSafeInteger)) {
    return null;
  }

  return { major, minor, patch };
}

export function formatVersion(version: Version): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

/**
 * Increment the patch component; major and minor pass through.
 * 0.4.9 → 0.4.10
 */
export function bumpPatch(text: string): StepResult<VersionBump> {
  const parsed = parseVersion(text);
  if (!parsed) {
    return fail(
      new ReleaseError(
        `Invalid version "${text}": expected major.minor.patch with numeric parts`,
        'PARSE_FAILURE',
        'bump',
        1,
        { input: text },
      ),
    );
  }

  return ok({
    from: text.trim(),
    to: formatVersion({ ...parsed, patch: parsed.patch + 1 }),
  });
}
