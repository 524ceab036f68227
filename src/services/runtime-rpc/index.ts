/**
 * Runtime RPC - system-of-record gateway over HTTP
 */

export {
  RuntimeRpcGateway,
  RPC_FUNCTIONS,
  classifyRpcError,
  type RpcFunction,
  type RuntimeRpcGatewayOptions,
} from "./rpc-gateway";

export {
  parsePositionRow,
  parseTradeRow,
  positionPatchToPayload,
  tradeFieldsToPayload,
} from "./row-mapping";
