/**
 * @fileoverview The Credential value object: an upstream access token plus an
 * optional subject identifier. Instances are frozen and compare by value.
 * The token never appears in `toString`, `toJSON` or `util.inspect` output.
 * @module src/ambient/credential
 */
import { inspect } from 'util';

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { sanitization } from '@/utils/security/sanitization.js';

export interface CredentialInit {
  accessToken: string;
  subjectId?: string | undefined;
}

export class Credential {
  readonly #accessToken: string;
  public readonly subjectId: string | undefined;

  private constructor(accessToken: string, subjectId: string | undefined) {
    this.#accessToken = accessToken;
    this.subjectId = subjectId;
    Object.freeze(this);
  }

  /**
   * Builds a credential, rejecting blank tokens. A blank `subjectId` is treated
   * as absent.
   */
  public static create({ accessToken, subjectId }: CredentialInit): Credential {
    if (typeof accessToken !== 'string' || accessToken.trim() === '') {
      throw new McpError(
        JsonRpcErrorCode.ValidationError,
        'A credential requires a non-empty access token.',
      );
    }
    const subject =
      typeof subjectId === 'string' && subjectId.trim() !== ''
        ? subjectId
        : undefined;
    return new Credential(accessToken, subject);
  }

  public get accessToken(): string {
    return this.#accessToken;
  }

  public equals(other: Credential | undefined): boolean {
    return (
      other !== undefined &&
      other.#accessToken === this.#accessToken &&
      other.subjectId === this.subjectId
    );
  }

  /** Masked token, safe for logs. */
  public get maskedToken(): string {
    return sanitization.maskSecret(this.#accessToken);
  }

  public toJSON(): { accessToken: string; subjectId?: string } {
    return {
      accessToken: this.maskedToken,
      ...(this.subjectId !== undefined ? { subjectId: this.subjectId } : {}),
    };
  }

  public toString(): string {
    return `Credential(${this.subjectId ?? 'anonymous'}, ${this.maskedToken})`;
  }

  [inspect.custom](): string {
    return this.toString();
  }
}
