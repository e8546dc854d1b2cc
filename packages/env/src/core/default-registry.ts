import { ProviderRegistry } from "./registry"

let defaultRegistry: ProviderRegistry | undefined

/**
 * Process-wide registry for code that cannot have one passed in.
 * Built on first use; prefer constructing and passing a `ProviderRegistry`.
 */
export function getDefaultRegistry(): ProviderRegistry {
  defaultRegistry ??= new ProviderRegistry()

  return defaultRegistry
}
