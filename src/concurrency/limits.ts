/** Fallback when MAX_CONCURRENT_RELEASES is unset. Each run already fans out one build per target. */
export const DEFAULT_MAX_CONCURRENT_RELEASES = 2;

export function getConcurrencyLimits(env: { MAX_CONCURRENT_RELEASES?: number } = {}) {
  return {
    releaseRuns: env.MAX_CONCURRENT_RELEASES ?? DEFAULT_MAX_CONCURRENT_RELEASES,
  };
}
