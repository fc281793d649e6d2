import type { Logger } from "@bucketfs/logger"
import { type Context, parseOrThrow, type RequestHandler } from "@bucketfs/server"
import { type ObjectMetadata, unwrapMetadataEnvelope } from "@bucketfs/store"
import type { ObjectModuleDeps } from "."
import {
  bucketParamsSchema,
  type UploadObjectForm,
  type UploadObjectResponse,
  uploadObjectFormSchema,
} from "./object.api.schema"

export function uploadObjectHandler({ store }: ObjectModuleDeps): RequestHandler {
  return async (c: Context) => {
    const { bucket } = parseOrThrow(bucketParamsSchema, c.req.param())
    const form = parseOrThrow(uploadObjectFormSchema, await c.req.parseBody())

    const key = resolveKey(form)
    const metadata = parseMetadata(form.json, c.var.logger, key)
    const contentType = resolveContentType(form)

    const result = await store.putObject(bucket, key, Buffer.from(await form.file.arrayBuffer()), {
      ...(contentType && { contentType }),
      ...(metadata && { metadata }),
    })

    return c.json<UploadObjectResponse>(
      {
        key: result.key,
        size: result.size,
        bucket: result.bucket,
        content_type: result.contentType ?? null,
        metadata: result.metadata,
      },
      201,
    )
  }
}

function resolveKey(form: UploadObjectForm): string {
  return form.key !== undefined && form.key !== "" ? form.key : form.file.name
}

function resolveContentType(form: UploadObjectForm): string | undefined {
  if (form.content_type) return form.content_type

  return form.file.type === "" ? undefined : form.file.type
}

/**
 * Malformed JSON never fails the upload; the object is stored without
 * metadata.
 */
function parseMetadata(
  json: string | undefined,
  logger: Logger,
  key: string,
): ObjectMetadata | undefined {
  if (json === undefined || json === "") return undefined

  let payload: unknown

  try {
    payload = JSON.parse(json)
  } catch (err) {
    logger.warn("Ignoring malformed upload metadata", { key, err })
    return undefined
  }

  return unwrapMetadataEnvelope(payload)
}
