import { type Context, parseOrThrow, type RequestHandler } from "@bucketfs/server"
import type { BucketModuleDeps } from "."
import {
  bucketParamsSchema,
  type CreateDirectoryResponse,
  createDirectoryQuerySchema,
} from "./bucket.api.schema"

export function createDirectoryHandler({ store }: BucketModuleDeps): RequestHandler {
  return async (c: Context) => {
    const { bucket } = parseOrThrow(bucketParamsSchema, c.req.param())
    const query = parseOrThrow(createDirectoryQuerySchema, c.req.query())

    const result = await store.createDirectory(bucket, query.directory_path)

    return c.json<CreateDirectoryResponse>(
      {
        message: `Directory '${result.directory}' created successfully in bucket '${result.bucket}'`,
        bucket: result.bucket,
        directory: result.directory,
        creation_date: result.creationDate.toISOString(),
      },
      201,
    )
  }
}
