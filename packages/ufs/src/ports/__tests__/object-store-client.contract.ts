import { isNotFoundError } from "@objectfs/errors"
import { readAll } from "../../tests/utils/read-all"
import type { ObjectStoreClient } from "../object-store-client"

export type ObjectStoreClientHarness = {
  name: string
  make: () => { client: ObjectStoreClient; bucket: string }
}

export function describeObjectStoreClientContract(h: ObjectStoreClientHarness) {
  describe(`ObjectStoreClient contract: ${h.name}`, () => {
    let client: ObjectStoreClient
    let bucket: string

    const put = async (key: string, content: string | Buffer) => {
      const body = Buffer.from(content)
      await client.putObject(bucket, key, body, body.length)
    }

    beforeEach(() => {
      const setup = h.make()

      client = setup.client
      bucket = setup.bucket
    })

    it("has a type", () => {
      expect(client.type.length).toBeGreaterThan(0)
    })

    describe("putObject / getObjectMetadata", () => {
      it("reports size, etag and modification time", async () => {
        await put("docs/readme.txt", "hello world")

        const meta = await client.getObjectMetadata(bucket, "docs/readme.txt")

        expect(meta).toMatchObject({ key: "docs/readme.txt", sizeInBytes: 11 })
        expect(meta?.etag).toEqual(expect.any(String))
        expect(meta?.lastModifiedMs).toEqual(expect.any(Number))
      })

      it("returns null for a missing key", async () => {
        expect(await client.getObjectMetadata(bucket, "missing")).toBeNull()
      })

      it("overwrites an existing key", async () => {
        await put("k", "first")
        await put("k", "second!")

        expect((await client.getObjectMetadata(bucket, "k"))?.sizeInBytes).toBe(7)
      })

      it("stores zero-length objects", async () => {
        await client.putObject(bucket, "dir/", Buffer.alloc(0), 0)

        expect((await client.getObjectMetadata(bucket, "dir/"))?.sizeInBytes).toBe(0)
      })
    })

    describe("getObjectRange", () => {
      it("returns the inclusive byte range", async () => {
        await put("range.txt", "0123456789")

        const body = await client.getObjectRange(bucket, "range.txt", 2, 5)

        expect((await readAll(body)).toString()).toBe("2345")
      })

      it("clips a range that runs past the end", async () => {
        await put("range.txt", "0123456789")

        const body = await client.getObjectRange(bucket, "range.txt", 8, 20)

        expect((await readAll(body)).toString()).toBe("89")
      })

      it("rejects with not-found for a missing key", async () => {
        const error = await client.getObjectRange(bucket, "missing", 0, 1).catch((e: unknown) => e)

        expect(isNotFoundError(error)).toBe(true)
      })
    })

    describe("delete", () => {
      it("deleteObject is a no-op for a missing key", async () => {
        await expect(client.deleteObject(bucket, "missing")).resolves.toBeUndefined()
      })

      it("deleteObject removes the key", async () => {
        await put("gone.txt", "x")
        await client.deleteObject(bucket, "gone.txt")

        expect(await client.getObjectMetadata(bucket, "gone.txt")).toBeNull()
      })

      it("deleteObjects reports only the keys it deleted", async () => {
        await put("a", "1")
        await put("b", "2")

        const deleted = await client.deleteObjects(bucket, ["a", "missing", "b"])

        expect([...deleted].sort()).toEqual(["a", "b"])
        expect(await client.getObjectMetadata(bucket, "a")).toBeNull()
      })
    })

    describe("listObjects", () => {
      beforeEach(async () => {
        for (const key of ["dir/a", "dir/b/c", "dir/b/d", "dir/", "top"]) await put(key, key)
      })

      it("groups by delimiter at the root", async () => {
        const page = await client.listObjects({ bucket, prefix: "", delimiter: "/", maxKeys: 100 })

        expect(page.objects.map((o) => o.key)).toEqual(["top"])
        expect(page.commonPrefixes).toEqual(["dir/"])
        expect(page.isTruncated).toBe(false)
        expect(page.nextContinuationToken).toBeNull()
      })

      it("groups by delimiter under a prefix, including the folder marker", async () => {
        const page = await client.listObjects({
          bucket,
          prefix: "dir/",
          delimiter: "/",
          maxKeys: 100,
        })

        expect(page.objects.map((o) => o.key)).toEqual(["dir/", "dir/a"])
        expect(page.commonPrefixes).toEqual(["dir/b/"])
      })

      it("lists every key under a prefix without a delimiter", async () => {
        const page = await client.listObjects({ bucket, prefix: "dir/", delimiter: "", maxKeys: 100 })

        expect(page.objects.map((o) => o.key)).toEqual(["dir/", "dir/a", "dir/b/c", "dir/b/d"])
        expect(page.commonPrefixes).toEqual([])
      })

      it("pages with continuation tokens", async () => {
        const seen: string[] = []
        let token: string | null = null
        let pages = 0

        do {
          const page = await client.listObjects({
            bucket,
            prefix: "",
            delimiter: "",
            maxKeys: 2,
            ...(token !== null && { continuationToken: token }),
          })
          seen.push(...page.objects.map((o) => o.key))
          token = page.isTruncated ? page.nextContinuationToken : null
          pages++
        } while (token !== null)

        expect(pages).toBe(3)
        expect(seen).toEqual(["dir/", "dir/a", "dir/b/c", "dir/b/d", "top"])
      })
    })

    describe("copyObject", () => {
      it("copies bytes to the destination key", async () => {
        await put("src.txt", "payload")

        await client.copyObject(bucket, "src.txt", bucket, "dst.txt")

        const body = await client.getObjectRange(bucket, "dst.txt", 0, 6)
        expect((await readAll(body)).toString()).toBe("payload")
        expect(await client.getObjectMetadata(bucket, "src.txt")).not.toBeNull()
      })

      it("rejects with not-found for a missing source", async () => {
        const error = await client
          .copyObject(bucket, "missing", bucket, "dst")
          .catch((e: unknown) => e)

        expect(isNotFoundError(error)).toBe(true)
      })
    })

    describe("tags", () => {
      it("returns null for a missing key", async () => {
        expect(await client.getObjectTags(bucket, "missing")).toBeNull()
      })

      it("returns an empty set for an untagged object", async () => {
        await put("t", "x")

        expect(await client.getObjectTags(bucket, "t")).toEqual([])
      })

      it("replaces the whole set", async () => {
        await put("t", "x")
        await client.setObjectTags(bucket, "t", [{ name: "env", value: "prod" }])
        await client.setObjectTags(bucket, "t", [{ name: "team", value: "data" }])

        expect(await client.getObjectTags(bucket, "t")).toEqual([{ name: "team", value: "data" }])
      })
    })

    describe("multipart upload", () => {
      it("assembles parts by part number", async () => {
        const uploadId = await client.initiateMultipartUpload(bucket, "big.bin")
        const etag2 = await client.uploadPart(bucket, "big.bin", uploadId, 2, Buffer.from("world"))
        const etag1 = await client.uploadPart(bucket, "big.bin", uploadId, 1, Buffer.from("hello "))

        await client.completeMultipartUpload(bucket, "big.bin", uploadId, [
          { partNumber: 1, etag: etag1 },
          { partNumber: 2, etag: etag2 },
        ])

        const body = await client.getObjectRange(bucket, "big.bin", 0, 10)
        expect((await readAll(body)).toString()).toBe("hello world")
      })

      it("aborting discards the session", async () => {
        const uploadId = await client.initiateMultipartUpload(bucket, "big.bin")
        await client.abortMultipartUpload(bucket, "big.bin", uploadId)

        const error = await client
          .uploadPart(bucket, "big.bin", uploadId, 1, Buffer.from("x"))
          .catch((e: unknown) => e)

        expect(isNotFoundError(error)).toBe(true)
        expect(await client.getObjectMetadata(bucket, "big.bin")).toBeNull()
      })
    })
  })
}
