export { DotenvFileProvider, type DotenvFileProviderOptions } from "./adapters/file/dotenv-file-provider"
export {
  DEFAULT_CACHE_TTL_SECONDS,
  InfisicalProvider,
  type InfisicalProviderDeps,
  type InfisicalProviderOptions,
  TOKEN_EXPIRY_MARGIN_SECONDS,
} from "./adapters/infisical/infisical-provider"
export {
  type RawSecretsResponse,
  rawSecretsResponseSchema,
  type UniversalAuthResponse,
  universalAuthResponseSchema,
} from "./adapters/infisical/infisical-schemas"
export {
  type LoadInfisicalOptionsInput,
  loadInfisicalOptions,
} from "./adapters/infisical/load-infisical-options"
export { StaticProvider, type StaticProviderOptions } from "./adapters/memory/static-provider"
export { getDefaultRegistry } from "./core/default-registry"
export { EnvError, ProviderError, type ProviderErrorCode } from "./core/errors"
export {
  ProviderHandle,
  type ProviderHit,
  ProviderRegistry,
  type ProviderRegistryDeps,
} from "./core/registry"
export {
  EnvResolver,
  type EnvResolverDeps,
  type EnvResolverOptions,
  type ResolutionLayer,
} from "./core/resolver"
export type { EnvProvider, ProviderClass } from "./ports/provider"
