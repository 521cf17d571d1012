/**
 * corepipe — SQLite schema
 *
 * This schema is the single source of truth for the database structure
 * at SCHEMA_VERSION (see ./migrate.ts).
 */

export const SCHEMA_SQL = `
PRAGMA foreign_keys = ON;

-- ============================================================
-- 設定テンプレート
-- ============================================================
CREATE TABLE IF NOT EXISTS config_templates (
  id                 TEXT PRIMARY KEY,
  name               TEXT NOT NULL,
  type               TEXT NOT NULL CHECK (type IN ('sing-box', 'xray')),
  content            TEXT NOT NULL,
  description        TEXT NOT NULL DEFAULT '',
  min_version        TEXT NOT NULL DEFAULT '',
  capabilities_json  TEXT NOT NULL DEFAULT '[]',
  schema_version     INTEGER NOT NULL DEFAULT 1,
  is_valid           INTEGER NOT NULL DEFAULT 1,
  validation_error   TEXT NOT NULL DEFAULT '',
  created_at         TEXT NOT NULL,
  updated_at         TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_config_templates_type ON config_templates(type);

-- ============================================================
-- エージェントホスト
-- ============================================================
CREATE TABLE IF NOT EXISTS agent_hosts (
  id                 TEXT PRIMARY KEY,
  name               TEXT NOT NULL,
  host               TEXT NOT NULL,             -- "address" or "address:port"
  token              TEXT NOT NULL DEFAULT '',
  core_type          TEXT NOT NULL DEFAULT '',  -- "sing-box" | "xray"
  core_version       TEXT NOT NULL DEFAULT '',
  capabilities_json  TEXT NOT NULL DEFAULT '[]',
  build_tags_json    TEXT NOT NULL DEFAULT '[]',
  template_id        TEXT,
  created_at         TEXT NOT NULL,
  updated_at         TEXT NOT NULL,
  FOREIGN KEY (template_id) REFERENCES config_templates(id) ON DELETE SET NULL
);

-- ============================================================
-- ノード（サーバー）
-- ============================================================
CREATE TABLE IF NOT EXISTS servers (
  id             TEXT PRIMARY KEY,
  agent_host_id  TEXT NOT NULL,
  group_id       TEXT,
  name           TEXT NOT NULL,
  inbounds_json  TEXT NOT NULL DEFAULT '[]',   -- 正規化済み Inbound[]
  created_at     TEXT NOT NULL,
  updated_at     TEXT NOT NULL,
  FOREIGN KEY (agent_host_id) REFERENCES agent_hosts(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_servers_agent_host ON servers(agent_host_id);

-- ============================================================
-- ノードユーザー
-- ============================================================
CREATE TABLE IF NOT EXISTS node_users (
  id          TEXT PRIMARY KEY,
  uuid        TEXT NOT NULL UNIQUE,
  email       TEXT NOT NULL,
  group_id    TEXT,
  enabled     INTEGER NOT NULL DEFAULT 1,
  expires_at  TEXT,
  created_at  TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_node_users_group ON node_users(group_id);

-- ============================================================
-- コアインスタンス
-- ============================================================
CREATE TABLE IF NOT EXISTS agent_core_instances (
  id                  TEXT PRIMARY KEY,
  agent_host_id       TEXT NOT NULL,
  instance_id         TEXT NOT NULL,
  core_type           TEXT NOT NULL,
  status              TEXT NOT NULL CHECK (status IN ('running', 'stopped')),
  config_template_id  TEXT,
  config_hash         TEXT NOT NULL DEFAULT '',
  listen_ports_json   TEXT NOT NULL DEFAULT '[]',
  last_heartbeat_at   TEXT,
  error_message       TEXT NOT NULL DEFAULT '',
  created_at          TEXT NOT NULL,
  updated_at          TEXT NOT NULL,
  FOREIGN KEY (agent_host_id) REFERENCES agent_hosts(id) ON DELETE CASCADE,
  FOREIGN KEY (config_template_id) REFERENCES config_templates(id) ON DELETE SET NULL,
  UNIQUE (agent_host_id, instance_id)
);

-- ============================================================
-- 切り替え監査ログ
-- ============================================================
CREATE TABLE IF NOT EXISTS agent_core_switch_logs (
  id                TEXT PRIMARY KEY,
  agent_host_id     TEXT NOT NULL,
  switch_id         TEXT NOT NULL,
  from_instance_id  TEXT,
  to_instance_id    TEXT,
  from_core_type    TEXT,
  to_core_type      TEXT NOT NULL,
  status            TEXT NOT NULL CHECK (status IN ('pending', 'in_progress', 'completed', 'failed')),
  message           TEXT NOT NULL DEFAULT '',
  operator_id       TEXT,
  created_at        TEXT NOT NULL,
  completed_at      TEXT,
  FOREIGN KEY (agent_host_id) REFERENCES agent_hosts(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_switch_logs_host_created ON agent_core_switch_logs(agent_host_id, created_at);
CREATE INDEX IF NOT EXISTS idx_switch_logs_status ON agent_core_switch_logs(status);
`;
