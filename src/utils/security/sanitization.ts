/**
 * @fileoverview Redaction helpers for anything that may reach a log line.
 * Credentials flow through request contexts and error data, so every field
 * whose name looks like a secret is replaced before it is serialized.
 * @module src/utils/security/sanitization
 */

const REDACTED = '[REDACTED]';

/**
 * Redacts sensitive values for logging.
 */
export class Sanitization {
  private static instance: Sanitization;

  /**
   * Field names considered sensitive. Matching is case-insensitive and also
   * applies to the individual words of camelCase, snake_case and kebab-case keys.
   */
  private sensitiveFields: string[] = [
    'password',
    'token',
    'accessToken',
    'access_token',
    'refresh_token',
    'secret',
    'apiKey',
    'credential',
    'authorization',
    'cookie',
    'client_secret',
  ];

  private constructor() {}

  public static getInstance(): Sanitization {
    if (!Sanitization.instance) {
      Sanitization.instance = new Sanitization();
    }
    return Sanitization.instance;
  }

  /**
   * Extends the list of sensitive field names.
   */
  public setSensitiveFields(fields: string[]): void {
    this.sensitiveFields = [
      ...new Set([
        ...this.sensitiveFields,
        ...fields.map((f) => f.toLowerCase()),
      ]),
    ];
  }

  public getSensitiveFields(): string[] {
    return [...this.sensitiveFields];
  }

  /**
   * Redaction paths for pino: each field at the top level and one level down
   * (e.g. `accessToken` and `*.accessToken`).
   */
  public getSensitivePinoFields(): string[] {
    const identifiers = this.sensitiveFields.filter((field) =>
      /^[A-Za-z_$][\w$]*$/.test(field),
    );
    return identifiers.flatMap((field) => [field, `*.${field}`]);
  }

  /**
   * Masks a secret down to its first four characters and its length,
   * e.g. `abcd…(32 chars)`. Secrets of eight characters or fewer are fully masked.
   */
  public maskSecret(secret: string): string {
    if (secret.length <= 8) {
      return REDACTED;
    }
    return `${secret.slice(0, 4)}…(${secret.length} chars)`;
  }

  /**
   * Returns a deep clone of `input` with sensitive fields replaced by
   * "[REDACTED]". Non-object input is returned unchanged.
   */
  public sanitizeForLogging(input: unknown): unknown {
    if (!input || typeof input !== 'object') return input;

    let cloned: unknown;
    try {
      cloned = structuredClone(input);
    } catch {
      // Class instances with methods or symbols cannot be cloned; fall back to their JSON form.
      cloned = JSON.parse(JSON.stringify(input)) as unknown;
    }
    this.redactSensitiveFields(cloned);
    return cloned;
  }

  private redactSensitiveFields(obj: unknown): void {
    if (!obj || typeof obj !== 'object') return;

    if (Array.isArray(obj)) {
      obj.forEach((item) => this.redactSensitiveFields(item));
      return;
    }

    const normalize = (str: string): string =>
      str.toLowerCase().replace(/[^a-z0-9]/g, '');
    const normalizedSensitiveSet = new Set(
      this.sensitiveFields.map((f) => normalize(f)).filter(Boolean),
    );
    const wordSensitiveSet = new Set(
      this.sensitiveFields.map((f) => f.toLowerCase()).filter(Boolean),
    );

    for (const [key, value] of Object.entries(obj)) {
      const keyWords = key
        .replace(/([A-Z])/g, ' $1')
        .toLowerCase()
        .split(/[\s_-]+/)
        .filter(Boolean);

      const isSensitive =
        normalizedSensitiveSet.has(normalize(key)) ||
        keyWords.some((w) => wordSensitiveSet.has(w));

      if (isSensitive) {
        Reflect.set(obj, key, REDACTED);
      } else if (value && typeof value === 'object') {
        this.redactSensitiveFields(value);
      }
    }
  }
}

export const sanitization = Sanitization.getInstance();

export const sanitizeInputForLogging = (input: unknown): unknown =>
  sanitization.sanitizeForLogging(input);
