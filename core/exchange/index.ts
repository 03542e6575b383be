/**
 * Exchange Module - Public Exports
 *
 * Execution targets (broker, copy-trade relay) and the router in front of them.
 */

// Base target types
export {
    ExecutionTarget
} from "./adapters/base/ExecutionTarget.js";

export type {
    ExecutionTargetOptions,
    OrderSide,
    RoutedOrder,
    TargetSubmission
} from "./adapters/base/ExecutionTarget.js";

export {
    loadOandaCredentials,
    loadRelayCredentials,
    maskSecret
} from "./adapters/base/TargetCredentials.js";

export type {
    OandaCredentials,
    OandaEnvironment,
    OandaSettings,
    RelayAuthStyle,
    RelayCredentials,
    RelaySettings
} from "./adapters/base/TargetCredentials.js";

export {
    ExecutionTargetError,
    ExecutionTargetErrorCode,
    createExecutionTargetError,
    errorCodeForStatus
} from "./adapters/base/ExecutionTargetError.js";

export type { ExecutionTargetErrorDetail } from "./adapters/base/ExecutionTargetError.js";

export { defaultFetch, fetchWithTimeout, readJsonBody } from "./adapters/base/http.js";
export type { FetchLike } from "./adapters/base/http.js";

// OANDA
export { OandaAdapter } from "./adapters/oanda/OandaAdapter.js";
export type { OandaAdapterOptions } from "./adapters/oanda/OandaAdapter.js";

// Copy-trade relay
export { CopyTradeRelayAdapter, relayAuthHeaders } from "./adapters/relay/CopyTradeRelayAdapter.js";
export type { CopyTradeRelayOptions } from "./adapters/relay/CopyTradeRelayAdapter.js";

// Routing
export { ExecutionRouter } from "./execution/ExecutionRouter.js";
export type { ExecutionTargets } from "./execution/ExecutionRouter.js";

export { DEFAULT_EXECUTION_CONFIG, simulationReason } from "./execution/ExecutionConfig.js";
export type { ExecutionRouterConfig } from "./execution/ExecutionConfig.js";

export { aggregateOutcomes } from "./execution/aggregate.js";
