import type { ErrorCode, ErrorInfo, ErrorKind } from '../types.js';
import { maskRegisteredSecrets } from './secrets.js';

const MAX_EXTERNAL_LENGTH = 200;
const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f-\u009f]/g;

/**
 * Make an externally supplied string safe to put in an ErrorInfo or a log
 * line: secrets masked, control characters replaced, length capped.
 */
export function sanitizeExternal(value: string, maxLength: number = MAX_EXTERNAL_LENGTH): string {
  const masked = maskRegisteredSecrets(value);
  const flattened = masked.replace(CONTROL_CHARACTERS, ' ').replace(/ {2,}/g, ' ').trim();
  if (flattened.length <= maxLength) {
    return flattened;
  }
  return `${flattened.slice(0, maxLength)}…`;
}

export function createErrorInfo(
  kind: ErrorKind,
  code: ErrorCode,
  message: string,
  detail?: ErrorInfo['detail']
): ErrorInfo {
  const info: ErrorInfo = { kind, code, message: sanitizeExternal(message) };
  if (detail) {
    info.detail = Object.fromEntries(
      Object.entries(detail).map(([key, value]) => [
        key,
        typeof value === 'string' ? sanitizeExternal(value) : value,
      ])
    );
  }
  return info;
}

export const buildFailure = (code: ErrorCode, message: string, detail?: ErrorInfo['detail']): ErrorInfo =>
  createErrorInfo('BuildFailure', code, message, detail);

export const verificationFailure = (code: ErrorCode, message: string, detail?: ErrorInfo['detail']): ErrorInfo =>
  createErrorInfo('VerificationFailure', code, message, detail);

export const publishFailure = (code: ErrorCode, message: string, detail?: ErrorInfo['detail']): ErrorInfo =>
  createErrorInfo('PublishFailure', code, message, detail);

export const duplicateRelease = (message: string, detail?: ErrorInfo['detail']): ErrorInfo =>
  createErrorInfo('DuplicateRelease', 'already_exists', message, detail);

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
