import type { ReleaseTrigger, VersionTag } from '../types.js';

const TAG_REF_PREFIX = 'refs/tags/';
const VERSION_TAG_PATTERN = /^v(0|[1-9][0-9]*)\.(0|[1-9][0-9]*)\.(0|[1-9][0-9]*)$/;

/**
 * Match an incoming ref against `v<major>.<minor>.<patch>`.
 *
 * Components follow semver's numeric rule: `0` or a number without leading
 * zeros, so `v01.2.3` is not a release tag. `v1.2.3` and `v01.2.3` would
 * otherwise name the same `1.2.3` distribution on the index.
 *
 * Anything else yields `matched: false`. That is the normal "do not run"
 * answer for branch pushes and unrelated tags, not an error.
 */
export function parseRef(rawRef: string): ReleaseTrigger {
  const candidate = rawRef.startsWith(TAG_REF_PREFIX)
    ? rawRef.slice(TAG_REF_PREFIX.length)
    : rawRef;

  if (candidate.startsWith('refs/')) {
    return Object.freeze({ rawRef, matched: false });
  }

  const match = VERSION_TAG_PATTERN.exec(candidate);
  if (!match) {
    return Object.freeze({ rawRef, matched: false });
  }

  const components = match.slice(1, 4).map(part => Number(part));
  if (!components.every(Number.isSafeInteger)) {
    return Object.freeze({ rawRef, matched: false });
  }

  const [major, minor, patch] = components;
  const version: VersionTag = Object.freeze({ major, minor, patch, raw: candidate });

  return Object.freeze({ rawRef, matched: true, version });
}

export function versionString(tag: VersionTag): string {
  return `${tag.major}.${tag.minor}.${tag.patch}`;
}
