import { type Context, parseOrThrow, type RequestHandler } from "@bucketfs/server"
import type { BucketModuleDeps } from "."
import { type CreateBucketResponse, createBucketRequestSchema } from "./bucket.api.schema"

export function createBucketHandler({ store }: BucketModuleDeps): RequestHandler {
  return async (c: Context) => {
    const body: unknown = await c.req.json().catch(() => undefined)
    const { name } = parseOrThrow(createBucketRequestSchema, body)

    const bucket = await store.createBucket(name)

    return c.json<CreateBucketResponse>(
      {
        message: `Bucket '${bucket.name}' created successfully`,
        bucket: bucket.name,
        creation_date: bucket.creationDate.toISOString(),
      },
      201,
    )
  }
}
