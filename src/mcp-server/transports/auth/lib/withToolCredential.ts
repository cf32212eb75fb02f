/**
 * @fileoverview Tool-handler wrapper for the MCP SDK. The OAuth proxy attaches
 * the caller's upstream token to `AuthInfo.extra`; the wrapper lifts it into a
 * Credential and runs the handler with it installed.
 * @module src/mcp-server/transports/auth/lib/withToolCredential
 */
import type { AuthInfo } from '@modelcontextprotocol/sdk/server/auth/types.js';

import { Credential } from '@/ambient/credential.js';
import { requestCredentials } from '@/ambient/credentialContext.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';

/**
 * The part of the SDK's `RequestHandlerExtra` the wrapper reads.
 */
export interface ToolCallExtra {
  authInfo?: AuthInfo;
}

function readString(
  record: Record<string, unknown> | undefined,
  key: string,
): string | undefined {
  const value = record?.[key];
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

/**
 * Builds the Credential carried by `authInfo`.
 * @throws {McpError} `Unauthorized` when no upstream token is attached.
 */
export function credentialFromAuthInfo(
  authInfo: AuthInfo | undefined,
  tokenKey: string,
): Credential {
  const accessToken = readString(authInfo?.extra, tokenKey);
  if (!accessToken) {
    throw new McpError(
      JsonRpcErrorCode.Unauthorized,
      'This tool call carries no upstream authorization.',
      { tokenKey },
    );
  }
  return Credential.create({
    accessToken,
    subjectId:
      readString(authInfo?.extra, 'subjectId') ??
      readString(authInfo?.extra, 'sub'),
  });
}

/**
 * Wraps a tool callback so that it runs with the caller's credential in the
 * request credential context.
 *
 * @example
 * server.registerTool('schedule_post', def, withToolCredential(
 *   config.upstream.tokenKey,
 *   async (args) => schedulePost(args),
 * ));
 */
export function withToolCredential<TArgs, TExtra extends ToolCallExtra, TResult>(
  tokenKey: string,
  handler: (args: TArgs, extra: TExtra) => TResult | Promise<TResult>,
): (args: TArgs, extra: TExtra) => Promise<TResult> {
  return async (args, extra) => {
    const credential = credentialFromAuthInfo(extra.authInfo, tokenKey);
    return requestCredentials.run(credential, () =>
      Promise.resolve(handler(args, extra)),
    );
  };
}
