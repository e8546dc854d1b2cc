import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { EnvSource } from "../env-source"

describeConfigSourceContract({
  name: "EnvSource",
  setup: async () => {},
  make: () => new EnvSource({ env: { INFISICAL_PROJECT: "proj-1" }, prefix: "INFISICAL_" }),
  expected: { PROJECT: "proj-1" },
})
