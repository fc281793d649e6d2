import * as fs from "node:fs/promises"
import * as path from "node:path"
import type { Clock } from "@bucketfs/clock"
import { hasSystemErrorCode } from "@bucketfs/errors"
import type { ObjectKey } from "../../ports/store-types"
import { DIRECTORY_MARKER, markerPath, SIDECAR_SUFFIX } from "../paths/path-resolver"

export function isDirectoryMarkerKey(key: ObjectKey): boolean {
  return key.endsWith("/")
}

export function isMarkerEntry(name: string): boolean {
  return name === DIRECTORY_MARKER
}

export function isSidecarEntry(name: string): boolean {
  return name.endsWith(SIDECAR_SUFFIX)
}

export function markerContent(createdAt: Date): string {
  return `S3-style directory marker created on ${createdAt.toISOString()}`
}

export function directorySegments(directoryPath: string): string[] {
  return directoryPath.split("/").filter((segment) => segment.length > 0)
}

export type CreatedDirectory = {
  /** Absolute path of the leaf directory. */
  path: string
  /** Slash-joined segments with a trailing `/`. */
  directory: string
  createdAt: Date
}

export class DirectoryMarkers {
  constructor(private readonly deps: { clock: Clock }) {}

  /**
   * Creates the directory chain named by a key ending in `/` and marks the
   * leaf. Re-running it rewrites the marker.
   */
  async materializeDirectory(bucketDir: string, key: ObjectKey): Promise<CreatedDirectory> {
    const segments = directorySegments(key)
    const leaf = path.join(bucketDir, ...segments)

    await fs.mkdir(leaf, { recursive: true })

    return this.mark(leaf, segments)
  }

  /**
   * Walks `directoryPath` one segment at a time, creating what is missing,
   * then marks the leaf.
   */
  async createDirectoryPath(
    bucketDir: string,
    directoryPath: string,
  ): Promise<CreatedDirectory> {
    const segments = directorySegments(directoryPath)

    let current = bucketDir
    for (const segment of segments) {
      current = path.join(current, segment)
      await mkdirIfMissing(current)
    }

    return this.mark(current, segments)
  }

  private async mark(leaf: string, segments: string[]): Promise<CreatedDirectory> {
    const createdAt = this.deps.clock.now()

    await fs.writeFile(markerPath(leaf), markerContent(createdAt), "utf-8")

    return { path: leaf, directory: `${segments.join("/")}/`, createdAt }
  }
}

async function mkdirIfMissing(dir: string): Promise<void> {
  try {
    await fs.mkdir(dir)
  } catch (err) {
    if (!hasSystemErrorCode(err, "EEXIST")) throw err
  }
}
