import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import type { ConfigSource } from "../source"

export type ConfigSourceHarness = {
  name: string
  make: (cwd: string) => Promise<ConfigSource>
  setup?: (cwd: string) => Promise<void>
  expected: Record<string, unknown>
}

export function describeConfigSourceContract(h: ConfigSourceHarness) {
  describe(`${h.name} (ConfigSource contract)`, () => {
    let cwd: string
    let source: ConfigSource

    beforeEach(async () => {
      cwd = await fs.mkdtemp(path.join(os.tmpdir(), "objectfs-config-"))
      await h.setup?.(cwd)
      source = await h.make(cwd)
    })

    afterEach(async () => {
      await fs.rm(cwd, { recursive: true, force: true })
    })

    it("has a non-empty name", () => {
      expect(source.name.length).toBeGreaterThan(0)
    })

    it("load() resolves to a plain object", async () => {
      const result = await source.load()

      expect(Object.getPrototypeOf(result)).toBe(Object.prototype)
    })

    it("load() is idempotent", async () => {
      expect(await source.load()).toEqual(await source.load())
    })

    it("load() does not leak a mutable reference", async () => {
      const first = await source.load()
      first.__MUTATED__ = "x"

      expect(await source.load()).not.toHaveProperty("__MUTATED__")
    })

    it("load() returns the configured values", async () => {
      expect(await source.load()).toMatchObject(h.expected)
    })
  })
}
