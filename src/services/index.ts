/**
 * Services Index
 *
 * - interfaces: boundaries the core talks through
 * - runtime-rpc: RemoteStateGateway over the system-of-record RPC endpoints
 */

export type {
  ExchangeSnapshotProvider,
  HealthEvidencePatch,
  PositionAck,
  RemoteStateGateway,
  TradeAck,
} from "./interfaces";

export * from "./runtime-rpc";
