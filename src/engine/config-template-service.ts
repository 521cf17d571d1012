/**
 * corepipe — Config Template Service
 *
 * テンプレートの CRUD。保存のたびにサンプルコンテキストで検証し、
 * 結果を isValid / validationError に記録する。
 */

import type Database from 'better-sqlite3';
import type { ConfigTemplate } from '../types/entities.js';
import type { CoreEngine } from '../types/inbound.js';
import type { ValidationResult } from '../types/template.js';
import { ConfigTemplateRepository } from '../db/repository/config-template-repository.js';
import { parseCoreEngine } from '../codec/registry.js';
import { normalizeVersion } from '../capability/derive.js';
import { loadDefaultTemplate } from '../template/defaults.js';
import { TemplateEngine } from '../template/engine.js';
import { TemplateValidator } from '../template/validator.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';

export const TEMPLATE_SCHEMA_VERSION = 1;

export interface CreateTemplateRequest {
  name: string;
  type: string;
  /** 省略時はエンジンごとの初期テンプレート */
  content?: string;
  description?: string;
  minVersion?: string;
  capabilities?: string[];
}

export type UpdateTemplateRequest = Partial<CreateTemplateRequest>;

function checkMinVersion(minVersion: string): string {
  const trimmed = minVersion.trim();
  if (trimmed !== '' && normalizeVersion(trimmed) === undefined) {
    throw new ValidationError(`invalid minVersion: ${minVersion}`);
  }
  return trimmed;
}

export class ConfigTemplateService {
  private readonly templates: ConfigTemplateRepository;
  private readonly engine: TemplateEngine;
  private readonly validator: TemplateValidator;

  constructor(db: Database.Database, engine: TemplateEngine = new TemplateEngine()) {
    this.templates = new ConfigTemplateRepository(db);
    this.engine = engine;
    this.validator = new TemplateValidator(engine);
  }

  createTemplate(request: CreateTemplateRequest): ConfigTemplate {
    const name = request.name.trim();
    if (name === '') throw new ValidationError('name is required');
    const type = parseCoreEngine(request.type);
    const content = request.content ?? loadDefaultTemplate(type);
    if (content.trim() === '') throw new ValidationError('content is required');

    const validation = this.validator.validateTemplate(content, type);
    return this.templates.create({
      name,
      type,
      content,
      description: request.description ?? '',
      minVersion: checkMinVersion(request.minVersion ?? ''),
      capabilities: request.capabilities ?? [],
      schemaVersion: TEMPLATE_SCHEMA_VERSION,
      isValid: validation.valid,
      validationError: validation.errors[0] ?? '',
    });
  }

  /** 本文か種別が変わったときだけ再検証する */
  updateTemplate(templateId: string, request: UpdateTemplateRequest): ConfigTemplate {
    const current = this.getTemplate(templateId);

    const name = request.name?.trim();
    if (name === '') throw new ValidationError('name must not be empty');
    const type = request.type !== undefined ? parseCoreEngine(request.type) : undefined;
    if (request.content !== undefined && request.content.trim() === '') {
      throw new ValidationError('content must not be empty');
    }

    let validity: { isValid: boolean; validationError: string } | undefined;
    if (request.content !== undefined || type !== undefined) {
      const validation = this.validator.validateTemplate(request.content ?? current.content, type ?? current.type);
      validity = { isValid: validation.valid, validationError: validation.errors[0] ?? '' };
    }

    const updated = this.templates.update(templateId, {
      ...(name !== undefined ? { name } : {}),
      ...(type !== undefined ? { type } : {}),
      ...(request.content !== undefined ? { content: request.content } : {}),
      ...(request.description !== undefined ? { description: request.description } : {}),
      ...(request.minVersion !== undefined ? { minVersion: checkMinVersion(request.minVersion) } : {}),
      ...(request.capabilities !== undefined ? { capabilities: request.capabilities } : {}),
      ...validity,
    });
    if (updated === undefined) {
      throw new NotFoundError(`config template not found: ${templateId}`);
    }
    return updated;
  }

  deleteTemplate(templateId: string): void {
    if (!this.templates.delete(templateId)) {
      throw new NotFoundError(`config template not found: ${templateId}`);
    }
  }

  getTemplate(templateId: string): ConfigTemplate {
    const template = this.templates.findById(templateId);
    if (template === undefined) {
      throw new NotFoundError(`config template not found: ${templateId}`);
    }
    return template;
  }

  listTemplates(type?: string): ConfigTemplate[] {
    return this.templates.findAll(type !== undefined ? parseCoreEngine(type) : undefined);
  }

  /** 保存せずに検証だけ行う */
  validateTemplate(content: string, type: string): ValidationResult {
    return this.validator.validateTemplate(content, type);
  }

  /** サンプルコンテキストで描画する。描画エラーは TemplateError のまま投げる。 */
  previewTemplate(content: string): string {
    return this.engine.previewRender(content);
  }

  defaultTemplate(type: string): { type: CoreEngine; content: string } {
    const engine = parseCoreEngine(type);
    return { type: engine, content: loadDefaultTemplate(engine) };
  }
}
