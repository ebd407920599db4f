import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("returns every variable when no prefix is set", async () => {
    const source = new EnvSource({ env: { A: "1", B: "2" } })

    expect(await source.load()).toEqual({ A: "1", B: "2" })
  })

  it("keeps only prefixed keys and strips the prefix", async () => {
    const source = new EnvSource({
      prefix: "OBJECTFS_",
      env: { OBJECTFS_BUCKET: "test-bucket", OBJECTFS_REGION: "us-east-1", HOME: "/root" },
    })

    expect(await source.load()).toEqual({ BUCKET: "test-bucket", REGION: "us-east-1" })
  })

  it("passes through undefined values", async () => {
    const source = new EnvSource({ env: { A: undefined } })

    expect(await source.load()).toEqual({ A: undefined })
  })
})
