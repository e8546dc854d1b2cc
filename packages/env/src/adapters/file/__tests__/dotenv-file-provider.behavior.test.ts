import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { ProviderError } from "../../../core/errors"
import { DotenvFileProvider } from "../dotenv-file-provider"

describe("DotenvFileProvider behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "envstack-file-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("parses comments, blanks, quotes and references", async () => {
    await fs.writeFile(path.join(cwd, ".env"), 'A=1\nB=${A}2\n# comment\n\nC="x y"')

    const provider = new DotenvFileProvider({ path: ".env", cwd, env: {} })

    await expect(provider.getAll()).resolves.toEqual({ A: "1", B: "12", C: "x y" })
  })

  it("keeps # and backslashes in values as written", async () => {
    await fs.writeFile(path.join(cwd, ".env"), 'PASSWORD=abc#123\nMSG="a\\nb"')

    const provider = new DotenvFileProvider({ path: ".env", cwd, env: {} })

    await expect(provider.getAll()).resolves.toEqual({ PASSWORD: "abc#123", MSG: "a\\nb" })
  })

  it("resolves references against earlier lines when a key is redefined", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "A=1\nB=${A}\nA=2\nP=/a\nP=${P}:/b")

    const provider = new DotenvFileProvider({ path: ".env", cwd, env: {} })

    await expect(provider.getAll()).resolves.toEqual({ A: "2", B: "1", P: "/a:/b" })
    await expect(provider.get("B")).resolves.toBe("1")
  })

  it("falls back to the given environment for references", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "LOG_DIR=${HOME_DIR}/logs")

    const provider = new DotenvFileProvider({ path: ".env", cwd, env: { HOME_DIR: "/srv" } })

    await expect(provider.get("LOG_DIR")).resolves.toBe("/srv/logs")
  })

  it("fails every call with file_not_found while the file is missing", async () => {
    const provider = new DotenvFileProvider({ path: ".env.local", cwd })
    const expected = path.join(cwd, ".env.local")

    for (const call of [() => provider.get("A"), () => provider.getAll(), () => provider.get("A")]) {
      const err = await call().catch((e: unknown) => e)

      expect(err).toBeInstanceOf(ProviderError)
      expect(err).toMatchObject({
        code: "file_not_found",
        message: `Environment file not found: ${expected}`,
        context: { path: expected },
        isRetryable: false,
      })
    }
  })

  it("re-reads the file on every call", async () => {
    const file = path.join(cwd, ".env")
    const provider = new DotenvFileProvider({ path: ".env", cwd, env: {} })

    await fs.writeFile(file, "MODE=one")
    await expect(provider.get("MODE")).resolves.toBe("one")

    await fs.writeFile(file, "MODE=two")
    await expect(provider.get("MODE")).resolves.toBe("two")

    await fs.rm(file)
    await expect(provider.get("MODE")).rejects.toMatchObject({ code: "file_not_found" })

    await fs.writeFile(file, "MODE=three")
    await expect(provider.get("MODE")).resolves.toBe("three")
  })

  it("resolves the path against cwd and keeps it absolute", () => {
    const provider = new DotenvFileProvider({ path: "config/.env", cwd: "/srv/app" })

    expect(provider.path).toBe("/srv/app/config/.env")
    expect(provider.name).toBe("file:config/.env")
  })

  it("keeps an absolute path as given", () => {
    const provider = new DotenvFileProvider({ path: "/etc/app/.env", cwd: "/srv/app" })

    expect(provider.path).toBe("/etc/app/.env")
  })

  it("surfaces read errors other than a missing file unchanged", async () => {
    await fs.mkdir(path.join(cwd, ".env"))

    const provider = new DotenvFileProvider({ path: ".env", cwd })

    await expect(provider.getAll()).rejects.toMatchObject({ code: "EISDIR" })
  })
})
