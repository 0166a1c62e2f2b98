import { InvariantContext, InvariantCheckResult, InvariantViolation, InvariantID } from './types.js';
import { getInvariantsByIds, getAllInvariants } from './registry.js';
import { logger as rootLogger, type Logger } from '../observability/logger.js';
import { InvariantViolationError, summarizeViolations } from './violations.js';

export function checkInvariants(
  context: InvariantContext,
  invariantIds?: InvariantID[],
  logger: Logger = rootLogger
): InvariantCheckResult {
  const invariants = invariantIds
    ? getInvariantsByIds(invariantIds)
    : getAllInvariants();

  const violations: InvariantViolation[] = [];

  for (const invariant of invariants) {
    try {
      if (!invariant.evaluate(context)) {
        violations.push({
          invariantId: invariant.id,
          description: invariant.description,
          severity: invariant.severity,
          timestamp: new Date().toISOString(),
        });

        logger.warn('invariant_violation', `Invariant violated: ${invariant.id}`, {
          invariantId: invariant.id,
          severity: invariant.severity,
          description: invariant.description,
        });
      }
    } catch (error) {
      logger.error('invariant_check_error', 'Error evaluating invariant', {
        invariantId: invariant.id,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }

  return {
    passed: violations.length === 0,
    violations,
  };
}

/** Throws when a fatal invariant is violated; lesser violations are only logged. */
export function enforceInvariants(
  context: InvariantContext,
  invariantIds?: InvariantID[],
  logger: Logger = rootLogger
): void {
  const result = checkInvariants(context, invariantIds, logger);

  if (!result.passed) {
    logger.error('invariant_enforcement', 'Invariant violations detected', {
      summary: summarizeViolations(result.violations),
    });

    const fatalViolations = result.violations.filter(v => v.severity === 'fatal');
    if (fatalViolations.length > 0) {
      throw new InvariantViolationError(fatalViolations);
    }
  }
}

export function safeCheckInvariants(
  context: InvariantContext,
  invariantIds?: InvariantID[],
  logger: Logger = rootLogger
): InvariantViolation[] {
  try {
    return checkInvariants(context, invariantIds, logger).violations;
  } catch (error) {
    logger.error('invariant_safe_check_error', 'Safe invariant check failed', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    return [];
  }
}
