import { mock } from "vitest-mock-extended"
import { StaticProvider } from "../../adapters/memory/static-provider"
import type { EnvProvider } from "../../ports/provider"
import { createCaptureLogger } from "../../tests/utils/capture-logger"
import { ProviderError } from "../errors"
import { ProviderHandle, ProviderRegistry } from "../registry"

class RemoteProvider extends StaticProvider {}

function permutations<T>(items: readonly T[]): T[][] {
  if (items.length <= 1) return [[...items]]

  return items.flatMap((item, i) =>
    permutations([...items.slice(0, i), ...items.slice(i + 1)]).map((rest) => [item, ...rest]),
  )
}

function deferred<T>() {
  let resolve: (value: T) => void = () => {}
  const promise = new Promise<T>((r) => (resolve = r))

  return { promise, resolve }
}

describe("ProviderRegistry", () => {
  describe("registration", () => {
    it("starts empty", () => {
      const registry = new ProviderRegistry()

      expect(registry.hasProviders).toBe(false)
      expect(registry.size).toBe(0)
    })

    it("counts every added provider, duplicates included", () => {
      const registry = new ProviderRegistry()
      const provider = new StaticProvider({})

      registry.addProvider(provider)
      registry.addProvider(provider)

      expect(registry.hasProviders).toBe(true)
      expect(registry.size).toBe(2)
    })

    it("removeAllProviders() empties the registry", async () => {
      const registry = new ProviderRegistry()
      registry.addProvider(new StaticProvider({ A: "1" }))

      registry.removeAllProviders()

      expect(registry.hasProviders).toBe(false)
      await expect(registry.getFromProviders("A")).resolves.toBeNull()
      await expect(registry.getAllFromProviders()).resolves.toEqual({})
    })
  })

  describe("typed lookup", () => {
    it("returns the registered instance for its handle", () => {
      const registry = new ProviderRegistry()
      const remote = new RemoteProvider({})

      const handle = registry.addProvider(remote)
      const found: RemoteProvider | null = registry.getProvider(handle)

      expect(handle).toBeInstanceOf(ProviderHandle)
      expect(found).toBe(remote)
    })

    it("returns null for a handle once the registry is cleared", () => {
      const registry = new ProviderRegistry()
      const handle = registry.addProvider(new RemoteProvider({}))

      registry.removeAllProviders()

      expect(registry.getProvider(handle)).toBeNull()
    })

    it("does not honour handles from another registry", () => {
      const handle = new ProviderRegistry().addProvider(new RemoteProvider({}))

      expect(new ProviderRegistry().getProvider(handle)).toBeNull()
    })

    it("finds the first provider of a class", () => {
      const registry = new ProviderRegistry()
      const plain = new StaticProvider({})
      const first = new RemoteProvider({}, { name: "first" })
      const second = new RemoteProvider({}, { name: "second" })

      registry.addProvider(plain)
      registry.addProvider(first)
      registry.addProvider(second)

      expect(registry.getProviderByType(RemoteProvider)).toBe(first)
      expect(registry.getProviderByType(StaticProvider)).toBe(plain)
    })

    it("returns null when no provider has the class", () => {
      const registry = new ProviderRegistry()
      registry.addProvider(new StaticProvider({}))

      expect(registry.getProviderByType(RemoteProvider)).toBeNull()
    })
  })

  describe("getFromProviders", () => {
    it("returns the value of the earliest registered provider for every order", async () => {
      const providers = [
        new StaticProvider({ SHARED: "a", ONLY_A: "a" }, { name: "a" }),
        new StaticProvider({ SHARED: "b" }, { name: "b" }),
        new StaticProvider({ SHARED: "c", ONLY_C: "c" }, { name: "c" }),
      ]

      for (const order of permutations(providers)) {
        const registry = new ProviderRegistry()
        for (const provider of order) registry.addProvider(provider)

        const firstWithShared = order[0]?.name

        await expect(registry.getFromProviders("SHARED")).resolves.toBe(firstWithShared)
        await expect(registry.getFromProviders("ONLY_A")).resolves.toBe("a")
        await expect(registry.getFromProviders("ONLY_C")).resolves.toBe("c")
        await expect(registry.getFromProviders("MISSING")).resolves.toBeNull()
      }
    })

    it("stops at the first hit", async () => {
      const first = mock<EnvProvider>({ name: "first" })
      const second = mock<EnvProvider>({ name: "second" })
      first.get.mockResolvedValue("from-first")

      const registry = new ProviderRegistry()
      registry.addProvider(first)
      registry.addProvider(second)

      await expect(registry.getFromProviders("KEY")).resolves.toBe("from-first")
      expect(first.get).toHaveBeenCalledWith("KEY")
      expect(second.get).not.toHaveBeenCalled()
    })

    it("treats an empty string as a hit", async () => {
      const registry = new ProviderRegistry()
      registry.addProvider(new StaticProvider({ FLAG: "" }))
      registry.addProvider(new StaticProvider({ FLAG: "fallback" }))

      await expect(registry.getFromProviders("FLAG")).resolves.toBe("")
    })

    it("fails fast with the first provider error", async () => {
      const failure = ProviderError.fileNotFound("/srv/app/.env")
      const broken = mock<EnvProvider>({ name: "broken" })
      const healthy = mock<EnvProvider>({ name: "healthy" })
      broken.get.mockRejectedValue(failure)
      healthy.get.mockResolvedValue("value")

      const registry = new ProviderRegistry()
      registry.addProvider(broken)
      registry.addProvider(healthy)

      await expect(registry.getFromProviders("KEY")).rejects.toBe(failure)
      expect(healthy.get).not.toHaveBeenCalled()
    })

    it("reports which provider answered", async () => {
      const registry = new ProviderRegistry()
      const b = new StaticProvider({ KEY: "b" }, { name: "b" })
      registry.addProvider(new StaticProvider({}, { name: "a" }))
      registry.addProvider(b)

      await expect(registry.findInProviders("KEY")).resolves.toEqual({ value: "b", provider: b })
      await expect(registry.findInProviders("NOPE")).resolves.toBeNull()
    })
  })

  describe("getAllFromProviders", () => {
    it("lets earlier providers win conflicts for every order", async () => {
      const maps = {
        a: { SHARED: "a", AB: "a", ONLY_A: "a" },
        b: { SHARED: "b", AB: "b", BC: "b" },
        c: { SHARED: "c", BC: "c", ONLY_C: "c" },
      }
      const names = ["a", "b", "c"] as const

      for (const order of permutations(names)) {
        const registry = new ProviderRegistry()
        for (const name of order) registry.addProvider(new StaticProvider(maps[name], { name }))

        const expected: Record<string, string> = {}
        for (const name of [...order].reverse()) Object.assign(expected, maps[name])

        await expect(registry.getAllFromProviders()).resolves.toEqual(expected)
      }
    })

    it("merges a concrete case", async () => {
      const registry = new ProviderRegistry()
      registry.addProvider(new StaticProvider({ A: "1", B: "2" }))
      registry.addProvider(new StaticProvider({ B: "x", C: "3" }))

      await expect(registry.getAllFromProviders()).resolves.toEqual({ A: "1", B: "2", C: "3" })
    })

    it("keeps a __proto__ key as an own value", async () => {
      const registry = new ProviderRegistry()
      const values = Object.fromEntries([
        ["__proto__", "x"],
        ["A", "1"],
      ])
      registry.addProvider(new StaticProvider(values))

      const merged = await registry.getAllFromProviders()

      expect(Object.keys(merged)).toEqual(["__proto__", "A"])
      expect(Object.getOwnPropertyDescriptor(merged, "__proto__")?.value).toBe("x")
      expect(Object.getPrototypeOf(merged)).toBe(Object.prototype)
    })

    it("fails fast with a provider error", async () => {
      const failure = new Error("down")
      const broken = mock<EnvProvider>({ name: "broken" })
      broken.getAll.mockRejectedValue(failure)

      const registry = new ProviderRegistry()
      registry.addProvider(new StaticProvider({ A: "1" }))
      registry.addProvider(broken)

      await expect(registry.getAllFromProviders()).rejects.toBe(failure)
    })
  })

  describe("snapshots", () => {
    it("finishes an in-flight lookup over the providers it started with", async () => {
      const gate = deferred<string | null>()
      const slow = mock<EnvProvider>({ name: "slow" })
      slow.get.mockReturnValue(gate.promise)

      const registry = new ProviderRegistry()
      registry.addProvider(slow)
      registry.addProvider(new StaticProvider({ KEY: "second" }))

      const pending = registry.getFromProviders("KEY")

      registry.removeAllProviders()
      registry.addProvider(new StaticProvider({ KEY: "late" }))
      gate.resolve(null)

      await expect(pending).resolves.toBe("second")
      await expect(registry.getFromProviders("KEY")).resolves.toBe("late")
    })

    it("does not consult providers added during a merge", async () => {
      const gate = deferred<Record<string, string>>()
      const slow = mock<EnvProvider>({ name: "slow" })
      slow.getAll.mockReturnValue(gate.promise)

      const registry = new ProviderRegistry()
      registry.addProvider(slow)

      const pending = registry.getAllFromProviders()

      registry.addProvider(new StaticProvider({ LATE: "1" }))
      gate.resolve({ EARLY: "1" })

      await expect(pending).resolves.toEqual({ EARLY: "1" })
    })
  })

  describe("logging", () => {
    it("logs registration and provider failures", async () => {
      const { logger, lines } = createCaptureLogger()
      const registry = new ProviderRegistry({ logger })
      const broken = mock<EnvProvider>({ name: "broken" })
      broken.get.mockRejectedValue(ProviderError.fileNotFound("/srv/app/.env"))

      registry.addProvider(broken)
      await registry.getFromProviders("KEY").catch(() => null)

      expect(lines[0]).toMatchObject({
        msg: "provider registered",
        component: "registry",
        provider: "broken",
        count: 1,
      })
      expect(lines.at(-1)).toMatchObject({
        level: 40,
        msg: "provider failed",
        provider: "broken",
        operation: "get",
        code: "file_not_found",
        err: { code: "file_not_found", context: { path: "/srv/app/.env" } },
      })
    })

    it("logs plain errors without a code", async () => {
      const { logger, lines } = createCaptureLogger()
      const registry = new ProviderRegistry({ logger })
      const broken = mock<EnvProvider>({ name: "broken" })
      broken.getAll.mockRejectedValue(new Error("socket closed"))

      registry.addProvider(broken)
      await registry.getAllFromProviders().catch(() => null)

      const failure = lines.at(-1)

      expect(failure).toMatchObject({
        msg: "provider failed",
        operation: "getAll",
        err: { message: "socket closed" },
      })
      expect(failure).not.toHaveProperty("code")
    })
  })
})
