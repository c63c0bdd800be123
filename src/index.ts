export { ZabbixClient, type ClientOptions } from './application/ZabbixClient.js';
export { Session, type RpcInvoker, type SessionOptions } from './application/session/Session.js';
export { VersionManager, type VersionChangeListener } from './application/version/VersionManager.js';
export {
  FEATURE,
  FEATURE_TABLE,
  computeFeatures,
  parseVersion,
  type FeatureName,
  type ParsedVersion
} from './application/version/features.js';
export {
  SchemaCodec,
  type ResourceCodec,
  type ShapedCodec,
  type WireShape,
  type WriteMode
} from './application/adapters/ResourceCodec.js';
export { CurrentItemCodec, LegacyItemCodec } from './application/adapters/ItemCodec.js';
export { CurrentHostCodec, LegacyHostCodec } from './application/adapters/HostCodec.js';
export { selectAdapters, type AdapterSet } from './application/adapters/selectAdapters.js';
export { listToMap, mapToList } from './application/adapters/nameValue.js';
export { RESOURCE_CATALOG, type ResourceDescriptor } from './application/resources/catalog.js';
export { ResourceAdapter } from './application/resources/ResourceAdapter.js';
export {
  ResourceOperations,
  ResourceReader,
  type OperationsContext
} from './application/resources/ResourceOperations.js';

export { RpcCaller, type CallOptions, type RpcCallerOptions, type RpcExchange } from './infrastructure/rpc/RpcCaller.js';
export { FetchPoster, type FetchLike, type HttpPoster, type PostResult } from './infrastructure/rpc/HttpPoster.js';
export { RPC_METHOD } from './infrastructure/rpc/protocol.js';
export {
  MemoryTraceSink,
  createFileTraceSink,
  guardTraceSink,
  noopTraceSink,
  stderrTraceSink,
  type TraceFailureHandler,
  type TraceSink
} from './infrastructure/trace/TraceSink.js';

export { loadConfigFromEnv, parseClientConfig } from './shared/config.js';
export { AppError, isAppError, type AppErrorOptions, type AppErrorSummary } from './shared/errors/AppError.js';
export { ERROR_CODE, type ErrorCode } from './shared/errors/ErrorCode.js';
export { TransportFailure, isTransportFailure, type TransportFailureReason } from './shared/errors/TransportFailure.js';
export { ProtocolError, isProtocolError, type RpcErrorObject } from './shared/errors/ProtocolError.js';
export { CardinalityError, CountMismatchError } from './shared/errors/CardinalityError.js';
export { UnsupportedFeatureError } from './shared/errors/UnsupportedFeatureError.js';
export { DecodeError } from './shared/errors/DecodeError.js';
export type { ClientConfig, ClientConfigInput, ResourceFamily } from './shared/schema/config.js';
export type { NameValueMap, NameValuePair, Output, Params } from './shared/schema/common.js';
export {
  ITEM_TYPE,
  MONITORED_BY,
  VALUE_TYPE,
  type Alert,
  type HistoryPushResult,
  type HistoryRecord,
  type Host,
  type HostGroup,
  type HostPrototype,
  type Item,
  type MediaType,
  type MonitoredBy,
  type Mfa,
  type ProxyGroup,
  type User
} from './shared/schema/resources.js';
export { CLIENT_NAME, CLIENT_VERSION, type ClientManifest } from './shared/version.js';
