/**
 * corepipe — MCP tool result helpers
 *
 * AppError はコード付きの isError 結果に変換する。それ以外の例外は
 * そのまま投げ、SDK 側のエラー処理に任せる。
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { AgentRpcError, AppError, CompatibilityError } from '../../utils/errors.js';

export function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

export function jsonResult(value: unknown): CallToolResult {
  return textResult(JSON.stringify(value, null, 2));
}

export function errorResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }], isError: true };
}

/** AppError の詳細（互換性の理由、監査ログ ID）を本文に添える */
export function describeAppError(err: AppError): string {
  const head = `${err.code ?? 'ERROR'}: ${err.message}`;
  if (err instanceof CompatibilityError && err.reasons.length > 0) {
    return `${head}\n- ${err.reasons.join('\n- ')}`;
  }
  if (err instanceof AgentRpcError && err.switchLogId !== undefined) {
    return `${head} (switch log ${err.switchLogId})`;
  }
  return head;
}

export async function runTool(fn: () => CallToolResult | Promise<CallToolResult>): Promise<CallToolResult> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof AppError) {
      return errorResult(describeAppError(err));
    }
    throw err;
  }
}
