import * as fs from "node:fs/promises"
import { hasSystemErrorCode } from "@bucketfs/errors"
import type { Logger } from "@bucketfs/logger"
import type { JsonValue, ObjectMetadata } from "../../ports/store-types"
import { sidecarPath } from "../paths/path-resolver"

export const INVALID_METADATA_MESSAGE =
  "Metadata file exists but contains invalid JSON format"

export function isJsonObject(value: unknown): value is ObjectMetadata {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function hasEntries(metadata: ObjectMetadata | undefined): metadata is ObjectMetadata {
  return metadata !== undefined && Object.keys(metadata).length > 0
}

/**
 * Upload payloads arrive as `{ "metadata": { ... } }`; only the inner object
 * is persisted.
 */
export function unwrapMetadataEnvelope(payload: unknown): ObjectMetadata | undefined {
  if (!isJsonObject(payload)) return undefined

  const inner: JsonValue | undefined = payload.metadata

  return isJsonObject(inner) ? inner : undefined
}

/**
 * Reads and writes `<object>.metadata`. Nothing here throws: failures are
 * logged and reported through the return value.
 */
export class MetadataSidecar {
  constructor(private readonly logger: Logger) {}

  async writeMetadata(objectFile: string, metadata: ObjectMetadata): Promise<boolean> {
    const file = sidecarPath(objectFile)

    try {
      await fs.writeFile(file, JSON.stringify(metadata, null, 2), "utf-8")
      return true
    } catch (err) {
      this.logger.warn("Failed to write metadata sidecar", { path: file, err })
      return false
    }
  }

  async readMetadata(objectFile: string): Promise<ObjectMetadata> {
    const file = sidecarPath(objectFile)

    let content: string
    try {
      content = await fs.readFile(file, "utf-8")
    } catch (err) {
      if (hasSystemErrorCode(err, "ENOENT", "ENOTDIR")) return {}

      this.logger.warn("Failed to read metadata sidecar", { path: file, err })
      return { error: `Error accessing metadata: ${describe(err)}` }
    }

    const parsed = parseJson(content)

    if (!isJsonObject(parsed)) {
      this.logger.warn("Metadata sidecar is not a JSON object", { path: file })
      return { error: INVALID_METADATA_MESSAGE }
    }

    return parsed
  }

  async deleteMetadata(objectFile: string): Promise<void> {
    const file = sidecarPath(objectFile)

    try {
      await fs.unlink(file)
    } catch (err) {
      if (hasSystemErrorCode(err, "ENOENT", "ENOTDIR")) return

      this.logger.warn("Failed to delete metadata sidecar", { path: file, err })
    }
  }
}

function parseJson(content: string): unknown {
  try {
    return JSON.parse(content)
  } catch {
    return undefined
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
