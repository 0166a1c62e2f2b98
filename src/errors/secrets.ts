const INDEX_TOKEN_SHAPE = /pypi-[A-Za-z0-9_-]+/g;

const registeredSecrets = new Set<string>();

/**
 * Mask a secret value, keeping only the last 4 characters.
 * Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

export function maskSecretsInMessage(message: string, secrets: Iterable<string>): string {
  let result = message;
  for (const secret of secrets) {
    if (secret.length > 0) {
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result.replace(INDEX_TOKEN_SHAPE, token => maskSecret(token));
}

/** Secrets registered here are masked in every log line and ErrorInfo message. */
export function registerSecret(secret: string): void {
  if (secret.length > 0) {
    registeredSecrets.add(secret);
  }
}

export function clearRegisteredSecrets(): void {
  registeredSecrets.clear();
}

export function maskRegisteredSecrets(message: string): string {
  return maskSecretsInMessage(message, registeredSecrets);
}

/**
 * An out-of-band credential. The raw value is only reachable through
 * `reveal()`; string conversion and JSON serialisation never expose it.
 */
export class Credential {
  constructor(
    private readonly value: string,
    public readonly label: string
  ) {
    registerSecret(value);
  }

  reveal(): string {
    return this.value;
  }

  toString(): string {
    return `[credential ${this.label}]`;
  }

  toJSON(): string {
    return this.toString();
  }
}
