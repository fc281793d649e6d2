import { type Context, parseOrThrow, type RequestHandler } from "@bucketfs/server"
import type { ObjectModuleDeps } from "."
import {
  bucketParamsSchema,
  type DeleteObjectResponse,
  objectKeyQuerySchema,
  objectParamsSchema,
} from "./object.api.schema"

export function deleteObjectHandler({ store }: ObjectModuleDeps): RequestHandler {
  return async (c: Context) => {
    const { bucket, key } = parseOrThrow(objectParamsSchema, c.req.param())

    return c.json<DeleteObjectResponse>(await remove(store, bucket, key))
  }
}

export function deleteObjectByQueryHandler({ store }: ObjectModuleDeps): RequestHandler {
  return async (c: Context) => {
    const { bucket } = parseOrThrow(bucketParamsSchema, c.req.param())
    const { object_key } = parseOrThrow(objectKeyQuerySchema, c.req.query())

    return c.json<DeleteObjectResponse>(await remove(store, bucket, object_key))
  }
}

async function remove(
  store: ObjectModuleDeps["store"],
  bucket: string,
  key: string,
): Promise<DeleteObjectResponse> {
  await store.deleteObject(bucket, key)

  return {
    message: `Object '${key}' deleted successfully from bucket '${bucket}'`,
    bucket,
    key,
  }
}
