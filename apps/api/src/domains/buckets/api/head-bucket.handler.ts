import { type Context, parseOrThrow, type RequestHandler } from "@bucketfs/server"
import type { BucketModuleDeps } from "."
import { bucketParamsSchema, type HeadBucketResponse } from "./bucket.api.schema"

/** Serves GET and HEAD; Hono strips the body from HEAD responses. */
export function headBucketHandler({ store }: BucketModuleDeps): RequestHandler {
  return async (c: Context) => {
    const { bucket } = parseOrThrow(bucketParamsSchema, c.req.param())

    const info = await store.headBucket(bucket)

    return c.json<HeadBucketResponse>({
      message: `Bucket ${info.name} exists`,
      bucket: info.name,
      creation_date: info.creationDate.toISOString(),
    })
  }
}
