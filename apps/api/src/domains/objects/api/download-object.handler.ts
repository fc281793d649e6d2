import { type Context, parseOrThrow, type RequestHandler } from "@bucketfs/server"
import { stream } from "hono/streaming"
import type { ObjectModuleDeps } from "."
import { setObjectHeaders } from "./object-response"
import { bucketParamsSchema, objectKeyQuerySchema, objectParamsSchema } from "./object.api.schema"

type ObjectRef = { bucket: string; key: string }

/** `/objects/<key>`: the key is the rest of the path. */
export function downloadObjectHandler(deps: ObjectModuleDeps): RequestHandler {
  return (c: Context) => serveObject(c, deps, parseOrThrow(objectParamsSchema, c.req.param()))
}

/** `/object?object_key=<key>` */
export function downloadObjectByQueryHandler(deps: ObjectModuleDeps): RequestHandler {
  return (c: Context) => {
    const { bucket } = parseOrThrow(bucketParamsSchema, c.req.param())
    const { object_key } = parseOrThrow(objectKeyQuerySchema, c.req.query())

    return serveObject(c, deps, { bucket, key: object_key })
  }
}

/**
 * GET streams the file. HEAD reaches this handler too and only stats it;
 * Hono drops the body of HEAD responses.
 */
async function serveObject(
  c: Context,
  { store }: ObjectModuleDeps,
  { bucket, key }: ObjectRef,
): Promise<Response> {
  if (c.req.method === "HEAD") {
    setObjectHeaders(c, await store.headObject(bucket, key))
    return c.body(null)
  }

  const { body, ...head } = await store.getObject(bucket, key)

  setObjectHeaders(c, head)

  return stream(
    c,
    async (s) => {
      s.onAbort(() => {
        body.destroy()
      })

      try {
        for await (const chunk of body) {
          await s.write(chunk)
        }
      } finally {
        body.destroy()
      }
    },
    async (err) => {
      c.var.logger.error("Object stream failed", { bucket, key, err })
    },
  )
}
