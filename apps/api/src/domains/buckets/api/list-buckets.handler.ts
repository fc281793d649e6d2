import type { Context, RequestHandler } from "@bucketfs/server"
import type { BucketModuleDeps } from "."
import type { ListBucketsResponse } from "./bucket.api.schema"

export function listBucketsHandler({ store }: BucketModuleDeps): RequestHandler {
  return async (c: Context) => {
    const buckets = await store.listBuckets()

    return c.json<ListBucketsResponse>({
      buckets: buckets.map((b) => ({
        name: b.name,
        creation_date: b.creationDate.toISOString(),
      })),
    })
  }
}
