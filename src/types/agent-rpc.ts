/**
 * corepipe — Agent RPC types
 *
 * The wire contract between this process and the agent running on each host.
 */

/** A proxy core installed on (or known to) the agent. */
export interface CoreInfo {
  type: string;
  version: string;
  installed: boolean;
  capabilities: string[];
}

export interface SwitchCoreRequest {
  /** Empty when bootstrapping the first instance. */
  fromInstanceId: string;
  toCoreType: string;
  /** Raw core configuration, sent verbatim. */
  configJson: string;
  /** Correlation ID shared with the audit log. */
  switchId: string;
  listenPorts: number[];
  zeroDowntime: boolean;
}

export interface SwitchCoreResponse {
  success: boolean;
  newInstanceId: string;
  message: string;
  error: string;
}

export interface AgentTlsConfig {
  caFile?: string;
  certFile?: string;
  keyFile?: string;
  insecureSkipVerify: boolean;
}

export interface AgentClientConfig {
  /** "address:port" */
  address: string;
  token: string;
  scheme: 'http' | 'https';
  timeoutMs: number;
  keepAliveMs: number;
  tls?: AgentTlsConfig;
}

/**
 * One connection to one agent. Implementations must honour the signal and
 * release sockets on close().
 */
export interface AgentClient {
  getCores(signal?: AbortSignal): Promise<CoreInfo[]>;
  switchCore(request: SwitchCoreRequest, signal?: AbortSignal): Promise<SwitchCoreResponse>;
  close(): void;
}

export type AgentClientFactory = (config: AgentClientConfig) => AgentClient;
