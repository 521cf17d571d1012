/**
 * corepipe — Agent Host Service
 *
 * エージェントホストの登録・能力報告・テンプレート割り当てと、
 * 割り当て済みテンプレートからの最終設定生成。
 *
 * 生成パイプライン: コンテキスト構築 → 能力フィルタ → 互換性検査 → 描画 → 最終検証
 */

import type Database from 'better-sqlite3';
import crypto from 'node:crypto';
import type { AgentCapabilities, CompatibilityResult } from '../types/capability.js';
import type { AgentHost, ConfigTemplate } from '../types/entities.js';
import type { TemplateContext, TemplateUser } from '../types/template.js';
import { AgentHostRepository } from '../db/repository/agent-host-repository.js';
import { ConfigTemplateRepository } from '../db/repository/config-template-repository.js';
import { NodeUserRepository } from '../db/repository/node-user-repository.js';
import { ServerRepository } from '../db/repository/server-repository.js';
import { normalizeCoreEngine } from '../codec/registry.js';
import { resolveAgentCapabilities } from '../capability/derive.js';
import { CapabilityFilter } from '../capability/filter.js';
import { DEFAULT_API_LISTEN } from '../template/helpers.js';
import { TemplateEngine } from '../template/engine.js';
import { TemplateValidator } from '../template/validator.js';
import { CompatibilityError, NotFoundError, ValidationError } from '../utils/errors.js';
import { logger as defaultLogger, withFields, type Logger } from '../utils/logger.js';

export interface CreateAgentHostRequest {
  name: string;
  host: string;
  /** 省略時はランダムな 32 バイトの hex を発行する */
  token?: string;
}

export interface ReportCapabilitiesRequest {
  coreType?: string;
  coreVersion?: string;
  capabilities?: string[];
  buildTags?: string[];
}

export interface AgentHostServiceOptions {
  logger?: Logger;
  engine?: TemplateEngine;
}

export class AgentHostService {
  private readonly hosts: AgentHostRepository;
  private readonly templates: ConfigTemplateRepository;
  private readonly servers: ServerRepository;
  private readonly users: NodeUserRepository;
  private readonly engine: TemplateEngine;
  private readonly validator: TemplateValidator;
  private readonly logger: Logger;

  constructor(db: Database.Database, options: AgentHostServiceOptions = {}) {
    this.hosts = new AgentHostRepository(db);
    this.templates = new ConfigTemplateRepository(db);
    this.servers = new ServerRepository(db);
    this.users = new NodeUserRepository(db);
    this.engine = options.engine ?? new TemplateEngine();
    this.validator = new TemplateValidator(this.engine);
    this.logger = options.logger ?? defaultLogger;
  }

  // ============================================================
  // ホスト
  // ============================================================

  createAgentHost(request: CreateAgentHostRequest): AgentHost {
    const name = request.name.trim();
    const host = request.host.trim();
    if (name === '') throw new ValidationError('name is required');
    if (host === '') throw new ValidationError('host is required');

    return this.hosts.create({
      name,
      host,
      token: request.token ?? crypto.randomBytes(32).toString('hex'),
      coreType: '',
    });
  }

  listAgentHosts(): AgentHost[] {
    return this.hosts.findAll();
  }

  getAgentHost(agentHostId: string): AgentHost {
    const host = this.hosts.findById(agentHostId);
    if (host === undefined) {
      throw new NotFoundError(`agent host not found: ${agentHostId}`);
    }
    return host;
  }

  /**
   * エージェントからの能力報告を保存する。
   * 何も報告されなかった場合は既存の値を残す。
   */
  reportCapabilities(agentHostId: string, report: ReportCapabilitiesRequest): AgentHost {
    const host = this.getAgentHost(agentHostId);

    const coreVersion = report.coreVersion?.trim() ?? '';
    const capabilities = report.capabilities ?? [];
    const buildTags = report.buildTags ?? [];
    if (coreVersion === '' && capabilities.length === 0 && buildTags.length === 0 && report.coreType === undefined) {
      return host;
    }

    let coreType = host.coreType;
    if (report.coreType !== undefined) {
      const engine = normalizeCoreEngine(report.coreType);
      if (engine === undefined) {
        throw new ValidationError(`unknown core type: ${report.coreType}`);
      }
      coreType = engine;
    }

    const updated = this.hosts.updateCapabilities(agentHostId, {
      coreType,
      coreVersion,
      capabilities,
      buildTags,
    });
    if (updated === undefined) {
      throw new NotFoundError(`agent host not found: ${agentHostId}`);
    }
    return updated;
  }

  // ============================================================
  // テンプレート割り当て
  // ============================================================

  /**
   * テンプレートを割り当てる。空の templateId は割り当て解除。
   * 互換性の問題は警告ログに残すだけで、割り当ては止めない。
   */
  assignTemplate(agentHostId: string, templateId: string): AgentHost {
    this.getAgentHost(agentHostId);

    if (templateId.trim() === '') {
      return this.requireUpdated(agentHostId, this.hosts.assignTemplate(agentHostId, undefined));
    }

    const compatibility = this.checkTemplateCompatibility(agentHostId, templateId);
    for (const warning of [...compatibility.errors, ...compatibility.warnings]) {
      this.logger.warn('Template compatibility warning', { agentHostId, templateId, warning });
    }

    return this.requireUpdated(agentHostId, this.hosts.assignTemplate(agentHostId, templateId));
  }

  /**
   * テンプレートとエージェントの互換性を検査する。
   * 検証に失敗しているテンプレートは常に互換なし。
   */
  checkTemplateCompatibility(agentHostId: string, templateId: string): CompatibilityResult {
    const host = this.getAgentHost(agentHostId);
    const template = this.getTemplate(templateId);

    if (!template.isValid) {
      return {
        compatible: false,
        warnings: [],
        errors: [`Template has validation errors: ${template.validationError}`],
      };
    }

    const filter = new CapabilityFilter(this.agentCapabilities(host, template));
    return filter.checkTemplateCompatibility(template.minVersion, template.capabilities);
  }

  // ============================================================
  // 設定生成
  // ============================================================

  /**
   * 割り当て済みテンプレートから最終設定を生成する。
   * テンプレート未割り当てなら undefined（エージェントはローカル設定を使い続ける）。
   */
  generateConfig(agentHostId: string): string | undefined {
    const host = this.getAgentHost(agentHostId);
    if (host.templateId === undefined) {
      return undefined;
    }
    return this.renderForHost(host, this.getTemplate(host.templateId));
  }

  /** 指定テンプレートをホスト向けに描画する（割り当ては問わない） */
  renderTemplateForHost(agentHostId: string, templateId: string): string {
    return this.renderForHost(this.getAgentHost(agentHostId), this.getTemplate(templateId));
  }

  /** ホストに紐づくノードとユーザーからテンプレートコンテキストを組み立てる */
  buildTemplateContext(host: AgentHost, template: ConfigTemplate): TemplateContext {
    const servers = this.servers.findByAgentHostId(host.id);

    const groupIds = new Set<string>();
    const inbounds = servers.flatMap((server) => {
      if (server.inbounds.length > 0 && server.groupId !== undefined) {
        groupIds.add(server.groupId);
      }
      return server.inbounds;
    });

    const users: TemplateUser[] = this.users.findEnabledByGroupIds([...groupIds]).map((u) => ({
      id: u.id,
      uuid: u.uuid,
      email: u.email,
      enabled: u.enabled,
    }));

    return {
      inbounds,
      outbounds: [
        { type: 'direct', tag: 'direct', settings: {} },
        { type: 'block', tag: 'block', settings: {} },
      ],
      users,
      agent: {
        id: host.id,
        name: host.name,
        coreType: template.type,
        coreVersion: host.coreVersion,
        capabilities: [...host.capabilities],
        buildTags: [...host.buildTags],
      },
      server: {
        logLevel: 'info',
        listenAddr: '::',
        dnsServer: '8.8.8.8',
        statsEnabled: true,
      },
      experimental: {
        v2rayApi: { listen: DEFAULT_API_LISTEN, statsEnabled: true },
      },
    };
  }

  private renderForHost(host: AgentHost, template: ConfigTemplate): string {
    const log = withFields(this.logger, { agentHostId: host.id, templateId: template.id });

    const filter = new CapabilityFilter(this.agentCapabilities(host, template));
    const { context, warnings } = filter.filterContext(this.buildTemplateContext(host, template));
    for (const warning of warnings) {
      log.warn('Config generation warning', { warning });
    }

    const compatibility = filter.checkTemplateCompatibility(template.minVersion, template.capabilities);
    if (!compatibility.compatible) {
      throw new CompatibilityError('template incompatible with agent', [
        ...compatibility.errors,
        ...compatibility.warnings,
      ]);
    }
    for (const warning of compatibility.warnings) {
      log.warn('Template compatibility warning', { warning });
    }

    const serializeWarnings: string[] = [];
    const rendered = this.engine.render(template.content, context, serializeWarnings);
    for (const warning of serializeWarnings) {
      log.warn('Config generation warning', { warning });
    }

    const validation = this.validator.validateFinalConfig(rendered, template.type);
    if (!validation.valid) {
      throw new ValidationError(`generated config validation failed: ${validation.errors.join('; ')}`);
    }
    for (const warning of validation.warnings) {
      log.warn('Config validation warning', { warning });
    }

    return rendered;
  }

  /** ホストの報告値から能力を確定する。コア種別が未報告ならテンプレートの種別を使う。 */
  private agentCapabilities(host: AgentHost, template: ConfigTemplate): AgentCapabilities {
    const coreType = host.coreType !== '' ? host.coreType : template.type;
    return resolveAgentCapabilities(coreType, host.coreVersion, host.capabilities, host.buildTags);
  }

  private getTemplate(templateId: string): ConfigTemplate {
    const template = this.templates.findById(templateId);
    if (template === undefined) {
      throw new NotFoundError(`config template not found: ${templateId}`);
    }
    return template;
  }

  private requireUpdated(agentHostId: string, host: AgentHost | undefined): AgentHost {
    if (host === undefined) {
      throw new NotFoundError(`agent host not found: ${agentHostId}`);
    }
    return host;
  }
}
