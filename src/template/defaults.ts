/**
 * corepipe — 組み込みの初期テンプレート
 *
 * templates/<engine>.hbs を読み込む。新しいテンプレートの雛形として使う。
 */

import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { CoreEngine } from '../types/inbound.js';

const TEMPLATES_DIR = new URL('../../templates/', import.meta.url);

export function defaultTemplatePath(engine: CoreEngine): string {
  return fileURLToPath(new URL(`${engine}.hbs`, TEMPLATES_DIR));
}

/** エンジンごとの初期テンプレート本文 */
export function loadDefaultTemplate(engine: CoreEngine): string {
  return fs.readFileSync(defaultTemplatePath(engine), 'utf-8');
}
