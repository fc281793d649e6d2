import path from "node:path"
import type { Context } from "@bucketfs/server"
import type { ObjectHead } from "@bucketfs/store"

// Printable ASCII. Anything else also gets an RFC 5987 `filename*`.
const PLAIN_FILENAME = /^[\x20-\x7e]*$/

export function contentDisposition(key: string): string {
  const filename = path.posix.basename(key)
  const quoted = filename.replace(/["\\]/g, "\\$&")

  if (PLAIN_FILENAME.test(filename)) return `attachment; filename="${quoted}"`

  const fallback = quoted.replace(/[^\x20-\x7e]/g, "_")

  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(filename)}`
}

export function setObjectHeaders(c: Context, head: ObjectHead): void {
  c.header("Content-Type", head.contentType)
  c.header("Content-Length", String(head.size))
  c.header("Last-Modified", head.lastModified.toUTCString())
  c.header("ETag", `"${head.etag}"`)
  c.header("Content-Disposition", contentDisposition(head.key))
}
