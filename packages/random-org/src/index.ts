export { FetchTransport, type FetchTransportDeps } from "./adapters/fetch/fetch-transport"
export { ScriptedTransport } from "./adapters/scripted/scripted-transport"
export { createRandomOrgClient } from "./config/create-random-org-client"
export {
  type LoadRandomOrgConfigOptions,
  loadRandomOrgConfig,
  mapEnvToConfig,
} from "./config/load-random-org-config"
export { type EnvConfig, envSchema, type RandomOrgConfig } from "./config/schema"
export {
  classifyRemoteCode,
  ProtocolError,
  type ProtocolErrorCode,
  RemoteError,
  type RemoteErrorDetails,
  type RemoteErrorKind,
  TransportError,
  type TransportErrorCode,
  ValidationError,
} from "./core/errors"
export { limits } from "./core/validation/validate-params"
export {
  DEFAULT_ENDPOINT,
  DEFAULT_TIMEOUT_MS,
  RandomOrgClient,
  type RandomOrgClientDeps,
  type RandomOrgClientOptions,
} from "./core/random-org-client"
export type * from "./ports/methods"
export { rpcMethods } from "./ports/methods"
export type * from "./ports/results"
export type { HttpRequest, HttpResponse, HttpTransport } from "./ports/transport"
