import { describeEnvProviderContract } from "../../../ports/__tests__/provider.contract"
import { StaticProvider } from "../static-provider"

describeEnvProviderContract({
  name: "StaticProvider",
  make: async (values) => ({ provider: new StaticProvider(values) }),
})
