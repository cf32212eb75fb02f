/**
 * @fileoverview Per-logical-request credential slot backed by AsyncLocalStorage.
 *
 * Each concurrent request runs in its own asynchronous context, so `get()`
 * called through the same accessor function returns a different credential
 * for each request. `run` and `isolate` open a scope that is torn down on
 * every exit path; `set`/`reset` give token-based nesting inside a scope.
 * A scope is a mutable slot shared by every continuation started inside it,
 * so a `reset` after an `await` is seen by the awaiting caller as well.
 *
 * @example
 * await requestCredentials.run(credential, async () => {
 *   await toolLogic(); // currentClient() resolves to `credential`
 * });
 *
 * requestCredentials.isolate(() => {
 *   const token = requestCredentials.set(other);
 *   try { ... } finally { requestCredentials.reset(token); }
 * });
 * @module src/ambient/credentialContext
 */
import { AsyncLocalStorage } from 'async_hooks';

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';

import { Credential } from './credential.js';

interface CredentialSlot {
  current: Credential | undefined;
}

/**
 * Opaque handle returned by {@link CredentialContext.set}. Restores the value
 * that was visible before the matching `set`; usable once.
 */
export class CredentialResetToken {
  #used = false;

  /** @internal */
  constructor(
    readonly owner: CredentialContext,
    readonly previous: Credential | undefined,
    /** @internal */
    readonly slot: CredentialSlot,
  ) {}

  get used(): boolean {
    return this.#used;
  }

  /** @internal */
  consume(): Credential | undefined {
    this.#used = true;
    return this.previous;
  }
}

export class CredentialContext {
  private readonly storage = new AsyncLocalStorage<CredentialSlot>();

  constructor(public readonly name: string) {}

  /**
   * The credential installed for the calling logical request, if any.
   */
  public get(): Credential | undefined {
    return this.storage.getStore()?.current;
  }

  /**
   * Installs `credential` for the remainder of the current scope and returns a
   * token that restores the previous value.
   * @throws {McpError} `ValidationError` outside `run` or `isolate`.
   */
  public set(credential: Credential): CredentialResetToken {
    const slot = this.storage.getStore();
    if (!slot) {
      throw new McpError(
        JsonRpcErrorCode.ValidationError,
        `Credential context '${this.name}' has no open scope; call set() inside run() or isolate().`,
      );
    }
    const token = new CredentialResetToken(this, slot.current, slot);
    slot.current = credential;
    return token;
  }

  /**
   * Restores the value captured by `token`.
   * @throws {McpError} `ValidationError` if the token belongs to another
   *   context or has already been used.
   */
  public reset(token: CredentialResetToken): void {
    if (token.owner !== this) {
      throw new McpError(
        JsonRpcErrorCode.ValidationError,
        `Reset token was issued by credential context '${token.owner.name}', not '${this.name}'.`,
      );
    }
    if (token.used) {
      throw new McpError(
        JsonRpcErrorCode.ValidationError,
        `Reset token for credential context '${this.name}' has already been used.`,
      );
    }
    token.slot.current = token.consume();
  }

  /**
   * Runs `body` with `credential` installed. The previous value is visible
   * again once `body` returns or throws; async continuations started inside
   * `body` keep seeing `credential`.
   */
  public run<T>(credential: Credential, body: () => T): T {
    return this.storage.run({ current: credential }, body);
  }

  /**
   * Runs `body` in a fresh scope that starts with the current value, so that
   * `set` calls inside it cannot affect the caller.
   */
  public isolate<T>(body: () => T): T {
    return this.storage.run({ current: this.get() }, body);
  }
}

/**
 * Credential slot for inbound requests. The publisher daemon owns a separate
 * instance.
 */
export const requestCredentials = new CredentialContext('request');

/**
 * Scoped acquisition for request entry points: builds a Credential, runs
 * `body` with it installed in {@link requestCredentials} and restores the
 * prior value on every exit path.
 */
export function withCredential<T>(
  accessToken: string,
  subjectId: string | undefined,
  body: () => T,
): T {
  return requestCredentials.run(
    Credential.create({ accessToken, subjectId }),
    body,
  );
}
