/**
 * corepipe — Agent Core Service
 *
 * エージェント上のコアインスタンスの作成・切り替えと、その監査ログ。
 *
 * 切り替えの順序:
 *   1. 入力検証・設定解決（ここまでに失敗すれば監査行もリモート呼び出しもない）
 *   2. (agentHostId, instanceId) 単位のロック取得
 *   3. pending の監査行を書く（失敗したら中断）
 *   4. in_progress へ（ベストエフォート）
 *   5. リモート呼び出し
 *   6. completed / failed をちょうど一度だけ書く
 *   7. インスタンス台帳の更新（ベストエフォート、失敗は reconciliationWarnings へ）
 */

import type Database from 'better-sqlite3';
import crypto from 'node:crypto';
import type {
  AgentClient,
  AgentClientFactory,
  CoreInfo,
  SwitchCoreResponse,
} from '../types/agent-rpc.js';
import type { AgentCoreInstance, AgentCoreSwitchLog, AgentHost, SwitchStatus } from '../types/entities.js';
import type { CoreEngine } from '../types/inbound.js';
import { AgentCoreInstanceRepository } from '../db/repository/agent-core-instance-repository.js';
import { AgentCoreSwitchLogRepository } from '../db/repository/agent-core-switch-log-repository.js';
import { AgentHostRepository } from '../db/repository/agent-host-repository.js';
import { convertConfig, parseCoreEngine, type ConvertOutcome } from '../codec/registry.js';
import { createHttpAgentClient } from '../rpc/agent-client.js';
import { config as appConfig } from '../config.js';
import { AgentHostService } from './agent-host-service.js';
import { AgentRpcError, AppError, ConflictError, NotFoundError, ValidationError, errorMessage } from '../utils/errors.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { logger as defaultLogger, withFields, type Logger } from '../utils/logger.js';

export const DEFAULT_SWITCH_LOG_LIMIT = 50;
export const MAX_SWITCH_LOG_LIMIT = 200;

// ============================================================
// 入出力
// ============================================================

/** 設定ソース。configJson があれば configTemplateId より優先し、そのまま送る。 */
export interface ConfigSource {
  configTemplateId?: string;
  configJson?: string;
}

export interface CreateInstanceRequest extends ConfigSource {
  agentHostId: string;
  coreType: string;
  instanceId: string;
  operatorId?: string;
}

export interface SwitchCoreRequest extends ConfigSource {
  agentHostId: string;
  fromInstanceId: string;
  toCoreType: string;
  /** 省略時は switch-<hostId>-<epoch ms> */
  switchId?: string;
  listenPorts?: number[];
  zeroDowntime?: boolean;
  operatorId?: string;
}

export interface SwitchResult {
  success: boolean;
  newInstanceId: string;
  message: string;
  error: string;
  switchLogId: string;
  fromInstanceId: string;
  toCoreType: string;
  /** 監査行が終端状態になったときだけ入る */
  completedAt?: string;
  /** リモート結果とは独立した、副次的な書き込みの失敗 */
  reconciliationWarnings: string[];
}

export interface GetSwitchLogsRequest {
  agentHostId: string;
  status?: SwitchStatus;
  startAt?: string;
  endAt?: string;
  limit?: number;
  offset?: number;
}

export interface SwitchLogPage {
  logs: AgentCoreSwitchLog[];
  total: number;
}

export interface AgentCoreServiceOptions {
  clientFactory?: AgentClientFactory;
  logger?: Logger;
  locks?: KeyedMutex;
  hostService?: AgentHostService;
  rpc?: Partial<typeof appConfig.agentRpc>;
}

interface ResolvedConfig {
  payload: string;
  hash: string;
  templateId?: string;
}

export function normalizeLimit(limit: number | undefined): number {
  if (limit === undefined || limit <= 0) return DEFAULT_SWITCH_LOG_LIMIT;
  return Math.min(Math.trunc(limit), MAX_SWITCH_LOG_LIMIT);
}

export function normalizeOffset(offset: number | undefined): number {
  if (offset === undefined || offset < 0) return 0;
  return Math.trunc(offset);
}

/**
 * ポートを持たないホストに既定の RPC ポートを付ける。
 * IPv6 アドレスは角括弧で囲む（`::1` → `[::1]:port`、`[::1]:9000` はそのまま）。
 */
export function agentAddress(host: string, defaultPort: number): string {
  if (host.startsWith('[')) {
    return /\]:\d+$/.test(host) ? host : `${host}:${defaultPort}`;
  }
  const colons = host.split(':').length - 1;
  if (colons > 1) {
    return `[${host}]:${defaultPort}`;
  }
  return colons === 1 ? host : `${host}:${defaultPort}`;
}

function lockKey(agentHostId: string, instanceId: string): string {
  return `${agentHostId}:${instanceId}`;
}

function firstNonEmpty(...values: string[]): string {
  return values.find((v) => v !== '') ?? '';
}

// ============================================================
// Service
// ============================================================

export class AgentCoreService {
  private readonly hosts: AgentHostRepository;
  private readonly instances: AgentCoreInstanceRepository;
  private readonly switchLogs: AgentCoreSwitchLogRepository;
  private readonly hostService: AgentHostService;
  private readonly clientFactory: AgentClientFactory;
  private readonly locks: KeyedMutex;
  private readonly logger: Logger;
  private readonly rpc: typeof appConfig.agentRpc;

  constructor(db: Database.Database, options: AgentCoreServiceOptions = {}) {
    this.hosts = new AgentHostRepository(db);
    this.instances = new AgentCoreInstanceRepository(db);
    this.switchLogs = new AgentCoreSwitchLogRepository(db);
    this.logger = options.logger ?? defaultLogger;
    this.hostService = options.hostService ?? new AgentHostService(db, { logger: this.logger });
    this.clientFactory = options.clientFactory ?? createHttpAgentClient;
    this.locks = options.locks ?? new KeyedMutex();
    this.rpc = { ...appConfig.agentRpc, ...options.rpc };
  }

  // ============================================================
  // 参照系
  // ============================================================

  /** エージェントに問い合わせたコア一覧をそのまま返す */
  async getCores(agentHostId: string, signal?: AbortSignal): Promise<CoreInfo[]> {
    const client = this.connect(this.requireHost(agentHostId));
    try {
      return await client.getCores(signal);
    } finally {
      client.close();
    }
  }

  getInstances(agentHostId: string): AgentCoreInstance[] {
    this.requireHost(agentHostId);
    return this.instances.findByAgentHostId(agentHostId);
  }

  getSwitchLogs(request: GetSwitchLogsRequest): SwitchLogPage {
    if (request.agentHostId.trim() === '') {
      throw new ValidationError('agentHostId is required');
    }
    const filter = {
      agentHostId: request.agentHostId,
      ...(request.status !== undefined ? { status: request.status } : {}),
      ...(request.startAt !== undefined ? { startAt: request.startAt } : {}),
      ...(request.endAt !== undefined ? { endAt: request.endAt } : {}),
    };
    return {
      logs: this.switchLogs.findByFilter({
        ...filter,
        limit: normalizeLimit(request.limit),
        offset: normalizeOffset(request.offset),
      }),
      total: this.switchLogs.countByFilter(filter),
    };
  }

  convertConfig(sourceEngine: string, targetEngine: string, rawConfig: string): ConvertOutcome {
    return convertConfig(sourceEngine, targetEngine, rawConfig);
  }

  // ============================================================
  // インスタンス
  // ============================================================

  /**
   * 最初のインスタンスを起動する（from が空の切り替え）。
   * リモートが失敗した場合は監査行を failed にしたうえで AgentRpcError を投げる。
   */
  async createInstance(request: CreateInstanceRequest, signal?: AbortSignal): Promise<AgentCoreInstance> {
    const instanceId = request.instanceId.trim();
    if (instanceId === '') throw new ValidationError('instanceId is required');
    const coreType = parseCoreEngine(request.coreType);
    const host = this.requireHost(request.agentHostId);
    const resolved = this.resolveConfig(host, request);

    if (this.instances.findByInstanceId(host.id, instanceId) !== undefined) {
      throw new ConflictError(`instance ${instanceId} already exists on agent host ${host.id}`);
    }

    const release = this.locks.tryAcquire(lockKey(host.id, instanceId));
    if (release === undefined) {
      throw new ConflictError(`instance ${instanceId} on agent host ${host.id} is busy`);
    }

    try {
      const client = this.connect(host);
      try {
        const log = this.switchLogs.create({
          agentHostId: host.id,
          switchId: `create-${host.id}-${instanceId}`,
          toInstanceId: instanceId,
          toCoreType: coreType,
          message: '',
          ...(request.operatorId !== undefined ? { operatorId: request.operatorId } : {}),
        });
        const warnings: string[] = [];
        this.markInProgress(log, warnings);

        let response: SwitchCoreResponse;
        try {
          response = await client.switchCore(
            {
              fromInstanceId: '',
              toCoreType: coreType,
              configJson: resolved.payload,
              switchId: log.switchId,
              listenPorts: [],
              zeroDowntime: false,
            },
            signal,
          );
        } catch (err) {
          const reason = this.failureReason(err, signal);
          this.finishLog(log, 'failed', reason, warnings);
          throw new AgentRpcError(`create instance failed: ${reason}`, log.id);
        }

        if (!response.success) {
          const reason = firstNonEmpty(response.error, response.message);
          this.finishLog(log, 'failed', reason, warnings);
          throw new AgentRpcError(`create instance failed: ${reason}`, log.id);
        }

        this.finishLog(log, 'completed', response.message, warnings);

        try {
          return this.instances.create({
            agentHostId: host.id,
            instanceId,
            coreType,
            status: 'running',
            ...(resolved.templateId !== undefined ? { configTemplateId: resolved.templateId } : {}),
            configHash: resolved.hash,
            listenPorts: [],
            errorMessage: '',
          });
        } catch (err) {
          this.logger.error('instance started on agent but not recorded', {
            agentHostId: host.id,
            switchLogId: log.id,
            error: errorMessage(err),
          });
          throw new AppError(`instance ${instanceId} started on agent but was not recorded: ${errorMessage(err)}`);
        }
      } finally {
        client.close();
      }
    } finally {
      release();
    }
  }

  /** 台帳からインスタンスを消す。切り替え中のインスタンスは消せない。 */
  deleteInstance(agentHostId: string, instanceId: string): void {
    const trimmed = instanceId.trim();
    if (trimmed === '') throw new ValidationError('instanceId is required');

    const instance = this.instances.findByInstanceId(agentHostId, trimmed);
    if (instance === undefined) {
      throw new NotFoundError(`instance not found: ${trimmed}`);
    }
    if (this.locks.isLocked(lockKey(agentHostId, trimmed))) {
      throw new ConflictError(`instance ${trimmed} on agent host ${agentHostId} is busy`);
    }
    this.instances.delete(instance.id);
  }

  // ============================================================
  // 切り替え
  // ============================================================

  /**
   * コアを切り替える。リモート側の失敗は例外にせず success=false で返す。
   * 入力・設定解決・ロック競合・pending 行の書き込み失敗は例外。
   */
  async switchCore(request: SwitchCoreRequest, signal?: AbortSignal): Promise<SwitchResult> {
    const fromInstanceId = request.fromInstanceId.trim();
    if (fromInstanceId === '') throw new ValidationError('fromInstanceId is required');
    const toCoreType = parseCoreEngine(request.toCoreType);
    const host = this.requireHost(request.agentHostId);
    const resolved = this.resolveConfig(host, request);

    const release = this.locks.tryAcquire(lockKey(host.id, fromInstanceId));
    if (release === undefined) {
      throw new ConflictError(`a switch is already running for instance ${fromInstanceId} on agent host ${host.id}`);
    }

    try {
      const client = this.connect(host);
      try {
        return await this.runSwitch(client, host, request, fromInstanceId, toCoreType, resolved, signal);
      } finally {
        client.close();
      }
    } finally {
      release();
    }
  }

  private async runSwitch(
    client: AgentClient,
    host: AgentHost,
    request: SwitchCoreRequest,
    fromInstanceId: string,
    toCoreType: CoreEngine,
    resolved: ResolvedConfig,
    signal: AbortSignal | undefined,
  ): Promise<SwitchResult> {
    const fromInstance = this.instances.findByInstanceId(host.id, fromInstanceId);
    const switchId = request.switchId?.trim() || `switch-${host.id}-${Date.now()}`;

    const log = this.switchLogs.create({
      agentHostId: host.id,
      switchId,
      fromInstanceId,
      ...(fromInstance !== undefined ? { fromCoreType: fromInstance.coreType } : {}),
      toCoreType,
      message: '',
      ...(request.operatorId !== undefined ? { operatorId: request.operatorId } : {}),
    });

    const warnings: string[] = [];
    this.markInProgress(log, warnings);

    const result: SwitchResult = {
      success: false,
      newInstanceId: '',
      message: '',
      error: '',
      switchLogId: log.id,
      fromInstanceId,
      toCoreType,
      reconciliationWarnings: warnings,
    };

    let response: SwitchCoreResponse;
    try {
      response = await client.switchCore(
        {
          fromInstanceId,
          toCoreType,
          configJson: resolved.payload,
          switchId,
          listenPorts: (request.listenPorts ?? []).filter((port) => port > 0),
          zeroDowntime: request.zeroDowntime ?? false,
        },
        signal,
      );
    } catch (err) {
      result.error = this.failureReason(err, signal);
      this.setCompletedAt(result, this.finishLog(log, 'failed', result.error, warnings));
      return result;
    }

    result.success = response.success;
    result.newInstanceId = response.newInstanceId;
    result.message = response.message;
    result.error = response.error;

    if (!response.success) {
      const reason = firstNonEmpty(response.error, response.message);
      this.setCompletedAt(result, this.finishLog(log, 'failed', reason, warnings));
      return result;
    }

    this.setCompletedAt(
      result,
      this.finishLog(log, 'completed', response.message, warnings, response.newInstanceId || undefined),
    );
    this.reconcileInstances(host, log, fromInstance, response.newInstanceId, toCoreType, resolved, request, warnings);
    return result;
  }

  /** 切り替え成功後の台帳更新: 旧インスタンスを stopped に、新インスタンスを running で登録 */
  private reconcileInstances(
    host: AgentHost,
    log: AgentCoreSwitchLog,
    fromInstance: AgentCoreInstance | undefined,
    newInstanceId: string,
    toCoreType: CoreEngine,
    resolved: ResolvedConfig,
    request: SwitchCoreRequest,
    warnings: string[],
  ): void {
    const logger = withFields(this.logger, { agentHostId: host.id, switchLogId: log.id });

    if (fromInstance !== undefined) {
      try {
        this.instances.update(fromInstance.id, { status: 'stopped', errorMessage: '' });
      } catch (err) {
        warnings.push(`failed to mark instance ${fromInstance.instanceId} stopped: ${errorMessage(err)}`);
        logger.error('failed to stop previous instance after switch', { error: errorMessage(err) });
      }
    }

    if (newInstanceId === '') {
      return;
    }
    try {
      this.instances.create({
        agentHostId: host.id,
        instanceId: newInstanceId,
        coreType: toCoreType,
        status: 'running',
        ...(resolved.templateId !== undefined ? { configTemplateId: resolved.templateId } : {}),
        configHash: resolved.hash,
        listenPorts: (request.listenPorts ?? []).filter((port) => port > 0),
        errorMessage: '',
      });
    } catch (err) {
      warnings.push(`failed to record instance ${newInstanceId}: ${errorMessage(err)}`);
      logger.error('failed to record new instance after switch', { error: errorMessage(err) });
    }
  }

  // ============================================================
  // 監査ログ
  // ============================================================

  private markInProgress(log: AgentCoreSwitchLog, warnings: string[]): void {
    try {
      if (!this.switchLogs.transition(log.id, 'in_progress')) {
        warnings.push(`switch log ${log.id} could not be moved to in_progress`);
        this.logger.warn('switch log not moved to in_progress', { agentHostId: log.agentHostId, switchLogId: log.id });
      }
    } catch (err) {
      warnings.push(`failed to mark switch log in_progress: ${errorMessage(err)}`);
      this.logger.error('failed to update switch log status', {
        agentHostId: log.agentHostId,
        switchLogId: log.id,
        error: errorMessage(err),
      });
    }
  }

  /**
   * 終端状態を書く。書けたときは completedAt を、書けなかったときは undefined を返す。
   */
  private finishLog(
    log: AgentCoreSwitchLog,
    status: 'completed' | 'failed',
    message: string,
    warnings: string[],
    toInstanceId?: string,
  ): string | undefined {
    const completedAt = new Date().toISOString();
    const logger = withFields(this.logger, { agentHostId: log.agentHostId, switchLogId: log.id, status });
    try {
      const applied = this.switchLogs.transition(log.id, status, {
        message,
        completedAt,
        ...(toInstanceId !== undefined ? { toInstanceId } : {}),
      });
      if (applied) {
        return completedAt;
      }
      warnings.push(`switch log ${log.id} is already terminal; ${status} was not recorded`);
      logger.warn('switch log already terminal');
    } catch (err) {
      warnings.push(`failed to mark switch log ${status}: ${errorMessage(err)}`);
      logger.error('failed to update switch log status', { error: errorMessage(err) });
    }
    return undefined;
  }

  private setCompletedAt(result: SwitchResult, completedAt: string | undefined): void {
    if (completedAt !== undefined) {
      result.completedAt = completedAt;
    }
  }

  private failureReason(err: unknown, signal: AbortSignal | undefined): string {
    if (signal?.aborted === true) {
      return `switch cancelled: ${errorMessage(signal.reason)}`;
    }
    return errorMessage(err);
  }

  // ============================================================
  // 共通
  // ============================================================

  private requireHost(agentHostId: string): AgentHost {
    if (agentHostId.trim() === '') {
      throw new ValidationError('agentHostId is required');
    }
    const host = this.hosts.findById(agentHostId);
    if (host === undefined) {
      throw new NotFoundError(`agent host not found: ${agentHostId}`);
    }
    return host;
  }

  /**
   * 送信する設定を決める。明示の configJson はそのまま使い、
   * なければテンプレートをこのホスト向けに描画する。
   */
  private resolveConfig(host: AgentHost, source: ConfigSource): ResolvedConfig {
    let payload: string;
    let templateId: string | undefined;

    if (source.configJson !== undefined && source.configJson.trim() !== '') {
      payload = source.configJson;
    } else if (source.configTemplateId !== undefined && source.configTemplateId.trim() !== '') {
      templateId = source.configTemplateId;
      payload = this.hostService.renderTemplateForHost(host.id, templateId);
    } else {
      throw new ValidationError('configJson or configTemplateId is required');
    }

    try {
      JSON.parse(payload);
    } catch (err) {
      throw new ValidationError(`config json is invalid: ${errorMessage(err)}`);
    }

    return {
      payload,
      hash: crypto.createHash('sha256').update(payload).digest('hex'),
      ...(templateId !== undefined ? { templateId } : {}),
    };
  }

  private connect(host: AgentHost): AgentClient {
    return this.clientFactory({
      address: agentAddress(host.host, this.rpc.defaultPort),
      token: host.token,
      scheme: this.rpc.scheme,
      timeoutMs: this.rpc.timeoutMs,
      keepAliveMs: this.rpc.keepAliveMs,
      tls: {
        ...(this.rpc.caFile !== undefined ? { caFile: this.rpc.caFile } : {}),
        ...(this.rpc.certFile !== undefined ? { certFile: this.rpc.certFile } : {}),
        ...(this.rpc.keyFile !== undefined ? { keyFile: this.rpc.keyFile } : {}),
        insecureSkipVerify: this.rpc.insecureSkipVerify,
      },
    });
  }
}
