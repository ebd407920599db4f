import { FakeClock } from "@objectfs/clock"
import { createNullLogger } from "@objectfs/logger"
import { MemoryObjectStoreClient } from "../../adapters/memory-object-store-client"
import { createStubS3Client } from "../../tests/utils/create-stub-s3-client"
import { readAll } from "../../tests/utils/read-all"
import { createS3UnderFileSystem } from "../create-from-config"
import { loadUfsConfig } from "../ufs-config"

describe("createS3UnderFileSystem", () => {
  it("wires an S3-backed filesystem from configuration", async () => {
    const clock = new FakeClock(0)
    const store = new MemoryObjectStoreClient({ clock })
    const { client, send } = createStubS3Client(store)
    const config = await loadUfsConfig({
      env: { OBJECTFS_BUCKET: "data", OBJECTFS_KEYSPACE_PREFIX: "mnt" },
    })

    const { ufs, s3Client, shutdown } = createS3UnderFileSystem(config.value, {
      clock,
      logger: createNullLogger(),
      s3Client: client,
    })

    const out = await ufs.create("/notes.txt")
    await out.write("hi")
    await out.close()

    const stream = await ufs.open("/notes.txt")

    expect(s3Client).toBe(client)
    expect(ufs.getUnderFsType()).toBe("s3")
    expect(ufs.options.keyspacePrefix).toBe("mnt")
    expect((await readAll(stream.toReadable())).toString()).toBe("hi")
    expect(await store.getObjectMetadata("data", "mnt/notes.txt")).toMatchObject({
      sizeInBytes: 2,
    })
    expect(send).toHaveBeenCalled()

    await shutdown()
    expect(client.destroy).toHaveBeenCalledTimes(1)
  })
})
