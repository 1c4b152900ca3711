export {
  BaseError,
  type BaseErrorOptions,
  type ErrorCode,
  type ErrorContext,
  type SerializedError,
  type SerializeOptions,
  serializeError,
} from "./base-error"
export {
  ClusterConnectionError,
  ConfigurationError,
  DiscoveryConnectivityError,
  DiscoveryProtocolError,
  isRetryableError,
  NodeUnavailableError,
  NoNodesError,
} from "./cache-errors"
export { errorChain, findInChain } from "./error-chain"
