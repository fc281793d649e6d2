import { type Context, parseOrThrow, type RequestHandler } from "@bucketfs/server"
import type { BucketModuleDeps } from "."
import {
  bucketParamsSchema,
  type DeleteBucketResponse,
  deleteBucketQuerySchema,
} from "./bucket.api.schema"

export function deleteBucketHandler({ store }: BucketModuleDeps): RequestHandler {
  return async (c: Context) => {
    const { bucket } = parseOrThrow(bucketParamsSchema, c.req.param())
    const { force } = parseOrThrow(deleteBucketQuerySchema, c.req.query())

    const result = await store.deleteBucket(bucket, { force })

    return c.json<DeleteBucketResponse>({
      message: `Bucket ${result.name} deleted successfully`,
      force_applied: result.forceApplied,
    })
  }
}
