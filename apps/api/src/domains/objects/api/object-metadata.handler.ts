import { type Context, parseOrThrow, type RequestHandler } from "@bucketfs/server"
import type { ObjectModuleDeps } from "."
import {
  bucketParamsSchema,
  type ObjectMetadataResponse,
  objectKeyQuerySchema,
  objectParamsSchema,
} from "./object.api.schema"

export function objectMetadataHandler({ store }: ObjectModuleDeps): RequestHandler {
  return async (c: Context) => {
    const { bucket, key } = parseOrThrow(objectParamsSchema, c.req.param())

    return c.json<ObjectMetadataResponse>({
      metadata: await store.getObjectMetadata(bucket, key),
    })
  }
}

export function objectMetadataByQueryHandler({ store }: ObjectModuleDeps): RequestHandler {
  return async (c: Context) => {
    const { bucket } = parseOrThrow(bucketParamsSchema, c.req.param())
    const { object_key } = parseOrThrow(objectKeyQuerySchema, c.req.query())

    return c.json<ObjectMetadataResponse>({
      metadata: await store.getObjectMetadata(bucket, object_key),
    })
  }
}
