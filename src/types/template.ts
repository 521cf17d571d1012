/**
 * corepipe — Template context types
 *
 * テンプレートに渡す構造化コンテキスト。ライブデータからも固定サンプルからも組み立てる。
 */

import type { Inbound } from './inbound.js';
import type { JsonObject } from '../utils/json.js';

export interface TemplateUser {
  id: string;
  uuid: string;
  email: string;
  enabled: boolean;
}

/** プロトコル向けに整形したユーザー（usersForProtocol の出力） */
export interface ProtocolUser {
  name: string;
  uuid?: string;
  password?: string;
  flow?: string;
}

export interface TemplateOutbound {
  type: string;
  tag: string;
  settings: JsonObject;
}

export interface AgentInfo {
  id: string;
  name: string;
  coreType: string;
  coreVersion: string;
  capabilities: string[];
  buildTags: string[];
}

export interface ServerInfo {
  logLevel: string;
  listenAddr: string;
  dnsServer: string;
  statsEnabled: boolean;
}

export interface V2RayApiSettings {
  listen: string;
  statsEnabled: boolean;
}

/**
 * experimental は常にオブジェクト。strict テンプレートで
 * `experimental.v2rayApi` を辿れるようにするため。
 */
export interface ExperimentalSettings {
  v2rayApi?: V2RayApiSettings;
}

export interface TemplateContext {
  inbounds: Inbound[];
  outbounds: TemplateOutbound[];
  users: TemplateUser[];
  agent: AgentInfo;
  server: ServerInfo;
  experimental: ExperimentalSettings;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}
