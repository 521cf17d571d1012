/**
 * corepipe — Template / Config Validator
 *
 * validateTemplate: 作成時の検証（構文 → サンプル描画 → JSON → 構造）。
 * validateFinalConfig: 描画済み設定の検証。エージェントへ送る前の最後の関門。
 */

import type { ValidationResult } from '../types/template.js';
import { isRecord } from '../utils/json.js';
import { normalizeCoreEngine } from '../codec/registry.js';
import type { TemplateEngine } from './engine.js';

function newResult(): ValidationResult {
  return { valid: true, errors: [], warnings: [] };
}

function addError(result: ValidationResult, message: string): void {
  result.valid = false;
  result.errors.push(message);
}

function isValidPort(port: unknown): boolean {
  return typeof port !== 'number' || (port > 0 && port <= 65535);
}

// ============================================================
// sing-box
// ============================================================

function validateSingBoxInbound(inbound: unknown, index: number, result: ValidationResult): void {
  if (!isRecord(inbound)) {
    addError(result, `Inbound ${index}: must be a JSON object`);
    return;
  }
  if (!('type' in inbound)) addError(result, `Inbound ${index}: missing 'type' field`);
  if (!('tag' in inbound)) addError(result, `Inbound ${index}: missing 'tag' field`);

  const type = inbound.type;
  switch (type) {
    case 'vless':
    case 'vmess':
    case 'trojan':
      if (!('users' in inbound)) {
        result.warnings.push(`Inbound ${index} (${type}): no 'users' defined - ensure users are injected`);
      }
      break;
    case 'shadowsocks': {
      const hasUsers = Array.isArray(inbound.users) && inbound.users.length > 0;
      if (!('method' in inbound) && !hasUsers) {
        result.warnings.push(`Inbound ${index} (shadowsocks): consider specifying 'method' for cipher`);
      }
      break;
    }
    case 'hysteria2':
    case 'tuic':
      if (!('tls' in inbound)) {
        result.warnings.push(`Inbound ${index} (${type}): typically requires 'tls' configuration`);
      }
      break;
  }

  if (!isValidPort(inbound.listen_port)) {
    addError(result, `Inbound ${index}: invalid port ${String(inbound.listen_port)}`);
  }
}

function validateSingBoxOutbound(outbound: unknown, index: number, result: ValidationResult): void {
  if (!isRecord(outbound)) {
    addError(result, `Outbound ${index}: must be a JSON object`);
    return;
  }
  if (!('type' in outbound)) addError(result, `Outbound ${index}: missing 'type' field`);
  if (!('tag' in outbound)) addError(result, `Outbound ${index}: missing 'tag' field`);
}

function validateSingBoxConfig(parsed: unknown, result: ValidationResult): void {
  if (!isRecord(parsed)) {
    addError(result, 'Config must be a JSON object');
    return;
  }

  if (!('inbounds' in parsed)) {
    result.warnings.push("Missing 'inbounds' section - will be injected by system if using dynamic mode");
  }
  if (!('outbounds' in parsed)) {
    result.warnings.push("Missing 'outbounds' section - recommend adding at least 'direct' and 'block'");
  }
  if (!('log' in parsed)) {
    result.warnings.push("Missing 'log' section - recommend adding for debugging");
  }

  if (Array.isArray(parsed.inbounds)) {
    parsed.inbounds.forEach((inbound, i) => validateSingBoxInbound(inbound, i, result));
  } else if (parsed.inbounds !== undefined) {
    addError(result, "'inbounds' must be an array");
  }
  if (Array.isArray(parsed.outbounds)) {
    parsed.outbounds.forEach((outbound, i) => validateSingBoxOutbound(outbound, i, result));
  } else if (parsed.outbounds !== undefined) {
    addError(result, "'outbounds' must be an array");
  }
}

// ============================================================
// Xray
// ============================================================

function validateXrayInbound(inbound: unknown, index: number, result: ValidationResult): void {
  if (!isRecord(inbound)) {
    addError(result, `Inbound ${index}: must be a JSON object`);
    return;
  }
  if (!('protocol' in inbound)) addError(result, `Inbound ${index}: missing 'protocol' field`);
  if (!('tag' in inbound)) addError(result, `Inbound ${index}: missing 'tag' field`);
  if (!('settings' in inbound)) {
    result.warnings.push(`Inbound ${index}: missing 'settings' - ensure it's injected or defined`);
  }
  if (!isValidPort(inbound.port)) {
    addError(result, `Inbound ${index}: invalid port ${String(inbound.port)}`);
  }
}

function validateXrayConfig(parsed: unknown, result: ValidationResult): void {
  if (!isRecord(parsed)) {
    addError(result, 'Config must be a JSON object');
    return;
  }

  if (!('inbounds' in parsed)) {
    result.warnings.push("Missing 'inbounds' section - will be injected by system if using dynamic mode");
  }
  if (!('outbounds' in parsed)) {
    result.warnings.push("Missing 'outbounds' section - recommend adding at least 'freedom' and 'blackhole'");
  }

  if (Array.isArray(parsed.inbounds)) {
    parsed.inbounds.forEach((inbound, i) => validateXrayInbound(inbound, i, result));
  } else if (parsed.inbounds !== undefined) {
    addError(result, "'inbounds' must be an array");
  }
}

/** 種別ごとの構造検査 */
function validateStructure(parsed: unknown, type: string, kind: 'template' | 'config', result: ValidationResult): void {
  const engine = normalizeCoreEngine(type);
  switch (engine) {
    case 'sing-box':
      validateSingBoxConfig(parsed, result);
      break;
    case 'xray':
      validateXrayConfig(parsed, result);
      break;
    case undefined:
      result.warnings.push(`Unknown ${kind} type '${type}', skipping type-specific validation`);
      break;
    default: {
      const _exhaustive: never = engine;
      throw new Error(`Unknown core engine: ${String(_exhaustive)}`);
    }
  }
}

// ============================================================
// Validator
// ============================================================

export class TemplateValidator {
  private readonly engine: TemplateEngine;

  constructor(engine: TemplateEngine) {
    this.engine = engine;
  }

  /** テンプレート単体の検証（ライブデータは使わない） */
  validateTemplate(content: string, type: string): ValidationResult {
    const result = newResult();

    let output: string;
    try {
      output = this.engine.previewRender(content);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      addError(result, `Template render error: ${message}`);
      return result;
    }

    validateStructure(JSON.parse(output), type, 'template', result);
    return result;
  }

  /** 描画済み設定の検証 */
  validateFinalConfig(raw: string, type: string): ValidationResult {
    const result = newResult();

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      addError(result, `Invalid JSON: ${message}`);
      return result;
    }

    validateStructure(parsed, type, 'config', result);
    return result;
  }
}
