import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { DotenvSource } from "../dotenv-source"

describe("DotenvSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "objectfs-dotenv-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("parses key=value pairs and ignores comments", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "# storage\nOBJECTFS_BUCKET=test-bucket\nOBJECTFS_REGION='us-east-1'\n",
    )

    const source = new DotenvSource({ file: ".env", required: true, cwd })

    expect(await source.load()).toEqual({
      OBJECTFS_BUCKET: "test-bucket",
      OBJECTFS_REGION: "us-east-1",
    })
  })

  it("strips the prefix when one is given", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "OBJECTFS_BUCKET=test-bucket\nOTHER=x\n")

    const source = new DotenvSource({ file: ".env", required: true, cwd, prefix: "OBJECTFS_" })

    expect(await source.load()).toEqual({ BUCKET: "test-bucket" })
  })

  it("returns nothing for a missing optional file", async () => {
    const source = new DotenvSource({ file: ".env.missing", required: false, cwd })

    expect(await source.load()).toEqual({})
  })

  it("rejects for a missing required file", async () => {
    const source = new DotenvSource({ file: ".env.missing", required: true, cwd })

    await expect(source.load()).rejects.toMatchObject({ code: "ENOENT" })
  })

  it("is named after its file", () => {
    expect(new DotenvSource({ file: ".env.local", required: false }).name).toBe("dotenv:.env.local")
  })
})
