/**
 * corepipe — Agent RPC client
 *
 * JSON over HTTP(S) to the agent: `GET /v1/cores`, `POST /v1/cores/switch`.
 * Responses are validated with zod before they reach the services.
 */

import { readFileSync } from 'node:fs';
import http from 'node:http';
import https from 'node:https';
import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { z } from 'zod';
import type {
  AgentClient,
  AgentClientConfig,
  AgentClientFactory,
  CoreInfo,
  SwitchCoreRequest,
  SwitchCoreResponse,
} from '../types/agent-rpc.js';
import { AgentRpcError, errorMessage } from '../utils/errors.js';
import { isRecord } from '../utils/json.js';

// ============================================================
// Wire schemas
// ============================================================

const CoreInfoSchema = z.object({
  type: z.string(),
  version: z.string().default(''),
  installed: z.boolean().default(false),
  capabilities: z.array(z.string()).default([]),
});

const GetCoresResponseSchema = z.object({
  cores: z.array(CoreInfoSchema).default([]),
});

const SwitchCoreResponseSchema = z.object({
  success: z.boolean(),
  newInstanceId: z.string().default(''),
  message: z.string().default(''),
  error: z.string().default(''),
});

export interface HttpAgentClientOptions {
  /** Replaces the network layer (tests). */
  adapter?: AxiosAdapter;
}

/** Pulls `error` / `message` out of an agent error body when there is one. */
function remoteReason(data: unknown): string | undefined {
  if (!isRecord(data)) return undefined;
  if (typeof data.error === 'string' && data.error !== '') return data.error;
  if (typeof data.message === 'string' && data.message !== '') return data.message;
  return undefined;
}

function toRpcError(operation: string, err: unknown): AgentRpcError {
  if (axios.isCancel(err)) {
    return new AgentRpcError(`${operation} cancelled`);
  }
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    const reason = remoteReason(err.response?.data) ?? err.message;
    return new AgentRpcError(
      status !== undefined ? `${operation} failed (HTTP ${status}): ${reason}` : `${operation} failed: ${reason}`,
    );
  }
  return new AgentRpcError(`${operation} failed: ${errorMessage(err)}`);
}

function buildHttpsAgent(config: AgentClientConfig): https.Agent {
  const tls = config.tls;
  return new https.Agent({
    keepAlive: true,
    keepAliveMsecs: config.keepAliveMs,
    ...(tls?.caFile !== undefined ? { ca: readFileSync(tls.caFile) } : {}),
    ...(tls?.certFile !== undefined ? { cert: readFileSync(tls.certFile) } : {}),
    ...(tls?.keyFile !== undefined ? { key: readFileSync(tls.keyFile) } : {}),
    rejectUnauthorized: !(tls?.insecureSkipVerify ?? false),
  });
}

// ============================================================
// Client
// ============================================================

export class HttpAgentClient implements AgentClient {
  private readonly http: AxiosInstance;
  private readonly httpAgent: http.Agent | undefined;
  private readonly httpsAgent: https.Agent | undefined;

  constructor(config: AgentClientConfig, options: HttpAgentClientOptions = {}) {
    if (config.scheme === 'https') {
      this.httpsAgent = buildHttpsAgent(config);
    } else {
      this.httpAgent = new http.Agent({ keepAlive: true, keepAliveMsecs: config.keepAliveMs });
    }

    this.http = axios.create({
      baseURL: `${config.scheme}://${config.address}`,
      timeout: config.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        ...(config.token !== '' ? { Authorization: `Bearer ${config.token}` } : {}),
      },
      ...(this.httpAgent !== undefined ? { httpAgent: this.httpAgent } : {}),
      ...(this.httpsAgent !== undefined ? { httpsAgent: this.httpsAgent } : {}),
      ...(options.adapter !== undefined ? { adapter: options.adapter } : {}),
    });
  }

  async getCores(signal?: AbortSignal): Promise<CoreInfo[]> {
    let data: unknown;
    try {
      const response = await this.http.get<unknown>('/v1/cores', { signal });
      data = response.data;
    } catch (err) {
      throw toRpcError('GetCores', err);
    }

    const parsed = GetCoresResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new AgentRpcError(`GetCores returned an unexpected body: ${parsed.error.message}`);
    }
    return parsed.data.cores;
  }

  async switchCore(request: SwitchCoreRequest, signal?: AbortSignal): Promise<SwitchCoreResponse> {
    let data: unknown;
    try {
      const response = await this.http.post<unknown>('/v1/cores/switch', request, { signal });
      data = response.data;
    } catch (err) {
      throw toRpcError('SwitchCore', err);
    }

    const parsed = SwitchCoreResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new AgentRpcError(`SwitchCore returned an unexpected body: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  close(): void {
    this.httpAgent?.destroy();
    this.httpsAgent?.destroy();
  }
}

export const createHttpAgentClient: AgentClientFactory = (config) => new HttpAgentClient(config);
