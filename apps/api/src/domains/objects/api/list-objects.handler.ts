import { type Context, parseOrThrow, type RequestHandler } from "@bucketfs/server"
import type { ListedObject } from "@bucketfs/store"
import type { ObjectModuleDeps } from "."
import {
  bucketParamsSchema,
  type ListObjectsResponse,
  listObjectsQuerySchema,
} from "./object.api.schema"

export function listObjectsHandler({ store }: ObjectModuleDeps): RequestHandler {
  return async (c: Context) => {
    const { bucket } = parseOrThrow(bucketParamsSchema, c.req.param())
    const { prefix } = parseOrThrow(listObjectsQuerySchema, c.req.query())

    const objects = await store.listObjects(bucket, prefix)

    return c.json<ListObjectsResponse>({
      objects: objects.sort(byKey).map((o) => ({
        key: o.key,
        size: o.size,
        last_modified: o.lastModified.toISOString(),
      })),
    })
  }
}

function byKey(a: ListedObject, b: ListedObject): number {
  if (a.key === b.key) return 0
  return a.key < b.key ? -1 : 1
}
