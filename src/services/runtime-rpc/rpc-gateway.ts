/**
 * Runtime RPC Gateway
 *
 * RemoteStateGateway over PostgREST-style RPC endpoints
 * (POST {base}/rest/v1/rpc/{function}). Every call carries the bot id and
 * the runtime ownership token; the token is passed through, never inspected.
 *
 * Failures are mapped onto the error taxonomy:
 * - network error, timeout, 408, 429, 5xx -> TransientTransportError
 * - 401, 403, 409                         -> ConflictError
 * - other 4xx, malformed rows             -> ValidationError
 *
 * The gateway never retries; retry policy belongs to the call site.
 */

import axios, { type AxiosInstance } from "axios";
import {
  ConflictError,
  TransientTransportError,
  ValidationError,
  toErrorMessage,
} from "../../errors/app.errors";
import type { RpcConfig } from "../../config/schema";
import type { Logger } from "../../infra/logging";
import { createNullLogger } from "../../infra/logging";
import type {
  Position,
  PositionPatch,
  PositionStatus,
  TradeFields,
  TradeKey,
  TradeRecord,
} from "../../models";
import type {
  HealthEvidencePatch,
  PositionAck,
  RemoteStateGateway,
  TradeAck,
} from "../interfaces";
import {
  isRow,
  parsePositionRow,
  parseTradeRow,
  positionPatchToPayload,
  tradeFieldsToPayload,
} from "./row-mapping";

export const RPC_FUNCTIONS = {
  getPosition: "bot_runtime_get_position",
  upsertPosition: "bot_runtime_upsert_position",
  upsertTrade: "bot_runtime_upsert_trade",
  getTrade: "bot_runtime_get_trade",
  listPositionTrades: "bot_runtime_list_position_trades",
  upsertHealthEvidence: "upsert_bot_health_evidence",
} as const;

export type RpcFunction = (typeof RPC_FUNCTIONS)[keyof typeof RPC_FUNCTIONS];

const TRANSIENT_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);
const CONFLICT_STATUS_CODES = new Set([401, 403, 409]);

export interface RuntimeRpcGatewayOptions extends RpcConfig {
  logger?: Logger;
  /** Pre-built axios instance (tests inject an adapter through this) */
  http?: AxiosInstance;
}

/**
 * Map a failed RPC call onto the error taxonomy
 */
export function classifyRpcError(rpc: string, error: unknown): Error {
  if (!axios.isAxiosError(error)) {
    return new TransientTransportError(
      `RPC ${rpc} failed: ${toErrorMessage(error)}`,
      rpc,
      undefined,
      error instanceof Error ? error : undefined,
    );
  }

  const status = error.response?.status;
  const body = error.response?.data;
  const detail =
    typeof body === "string" ? body : body !== undefined ? JSON.stringify(body) : error.message;

  if (status === undefined || TRANSIENT_STATUS_CODES.has(status) || status >= 500) {
    return new TransientTransportError(
      `RPC ${rpc} failed [${status ?? error.code ?? "network"}]: ${detail}`,
      rpc,
      status,
      error,
    );
  }

  if (CONFLICT_STATUS_CODES.has(status)) {
    return new ConflictError(`RPC ${rpc} rejected [${status}]: ${detail}`, rpc, status, error);
  }

  return new ValidationError(`RPC ${rpc} rejected payload [${status}]: ${detail}`, undefined, error);
}

export class RuntimeRpcGateway implements RemoteStateGateway {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(private readonly options: RuntimeRpcGatewayOptions) {
    this.logger = options.logger ?? createNullLogger();
    this.http =
      options.http ??
      axios.create({
        baseURL: `${options.rpcBaseUrl.replace(/\/+$/, "")}/rest/v1/rpc`,
        timeout: options.rpcTimeoutMs,
      });
  }

  private headers(): Record<string, string> {
    return {
      apikey: this.options.serviceRoleKey,
      Authorization: `Bearer ${this.options.serviceRoleKey}`,
      "Content-Type": "application/json",
      "x-runtime-token": this.options.runtimeToken,
    };
  }

  private async call(rpc: RpcFunction, body: Record<string, unknown>): Promise<unknown> {
    const startedAt = Date.now();
    try {
      const response = await this.http.post<unknown>(`/${rpc}`, body, {
        headers: this.headers(),
      });
      this.logger.debug("rpc ok", {
        category: "RPC",
        rpc,
        status: response.status,
        latencyMs: Date.now() - startedAt,
      });
      return response.status === 204 ? null : response.data;
    } catch (err) {
      const classified = classifyRpcError(rpc, err);
      this.logger.warn("rpc failed", {
        category: "RPC",
        rpc,
        error: classified.name,
        latencyMs: Date.now() - startedAt,
      });
      throw classified;
    }
  }

  /** PostgREST returns set-returning functions as arrays */
  private static single(data: unknown): unknown {
    if (Array.isArray(data)) return data.length > 0 ? data[0] : null;
    return data ?? null;
  }

  private static requireBotId(botId: string): void {
    if (!botId || !botId.trim()) {
      throw new ValidationError("botId is required", "botId");
    }
  }

  async getCanonicalPosition(botId: string, status: PositionStatus): Promise<Position | null> {
    RuntimeRpcGateway.requireBotId(botId);
    const data = RuntimeRpcGateway.single(
      await this.call(RPC_FUNCTIONS.getPosition, { p_bot_id: botId, p_status: status }),
    );
    return data === null ? null : parsePositionRow(botId, data);
  }

  async upsertPosition(botId: string, payload: PositionPatch): Promise<PositionAck> {
    RuntimeRpcGateway.requireBotId(botId);
    const data = RuntimeRpcGateway.single(
      await this.call(RPC_FUNCTIONS.upsertPosition, {
        p_bot_id: botId,
        p_payload: positionPatchToPayload(payload),
      }),
    );
    const returnedId = isRow(data) && typeof data.id === "string" ? data.id : null;
    return { positionId: returnedId ?? payload.positionId };
  }

  async upsertTrade(
    botId: string,
    clientOrderId: string,
    exchangeOrderId: string | null,
    payload: TradeFields,
  ): Promise<TradeAck> {
    RuntimeRpcGateway.requireBotId(botId);
    if (!clientOrderId) {
      throw new ValidationError("clientOrderId is required", "clientOrderId");
    }
    const data = RuntimeRpcGateway.single(
      await this.call(RPC_FUNCTIONS.upsertTrade, {
        p_bot_id: botId,
        p_client_order_id: clientOrderId,
        p_exchange_order_id: exchangeOrderId,
        p_payload: tradeFieldsToPayload(payload),
      }),
    );
    if (isRow(data) && data.client_order_id !== undefined) {
      const row = parseTradeRow(botId, data);
      return {
        clientOrderId: row.clientOrderId,
        exchangeOrderId: row.exchangeOrderId,
        status: row.status,
      };
    }
    return { clientOrderId, exchangeOrderId, status: payload.status };
  }

  async getTrade(botId: string, key: TradeKey): Promise<TradeRecord | null> {
    RuntimeRpcGateway.requireBotId(botId);
    const data = RuntimeRpcGateway.single(
      await this.call(RPC_FUNCTIONS.getTrade, {
        p_bot_id: botId,
        p_client_order_id: "clientOrderId" in key ? key.clientOrderId : null,
        p_exchange_order_id: "exchangeOrderId" in key ? key.exchangeOrderId : null,
      }),
    );
    return data === null ? null : parseTradeRow(botId, data);
  }

  async listTradesForPosition(botId: string, positionId: string): Promise<TradeRecord[]> {
    RuntimeRpcGateway.requireBotId(botId);
    const data = await this.call(RPC_FUNCTIONS.listPositionTrades, {
      p_bot_id: botId,
      p_position_id: positionId,
    });
    if (data === null) return [];
    if (!Array.isArray(data)) {
      throw new ValidationError(`RPC ${RPC_FUNCTIONS.listPositionTrades} returned a non-array`);
    }
    return data.map((row) => parseTradeRow(botId, row));
  }

  async upsertHealthEvidence(botId: string, patch: HealthEvidencePatch): Promise<void> {
    RuntimeRpcGateway.requireBotId(botId);
    await this.call(RPC_FUNCTIONS.upsertHealthEvidence, { p_bot_id: botId, p_patch: patch });
  }
}
