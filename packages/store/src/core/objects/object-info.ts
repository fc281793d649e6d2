import { createHash } from "node:crypto"
import * as path from "node:path"
import mime from "mime-types"
import type { Bytes, ObjectKey } from "../../ports/store-types"

export const DEFAULT_CONTENT_TYPE = "application/octet-stream"

export function contentTypeFor(key: ObjectKey): string {
  return mime.lookup(path.posix.basename(key)) || DEFAULT_CONTENT_TYPE
}

/**
 * Weak identity over key, size and modification time. Unquoted; the HTTP
 * layer adds the quotes.
 */
export function computeEtag(key: ObjectKey, size: Bytes, lastModified: Date): string {
  const digest = createHash("md5")
    .update(`${key}${size}${lastModified.getTime()}`)
    .digest("hex")

  return `md5-${digest}`
}
