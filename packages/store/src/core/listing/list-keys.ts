import type { Dirent } from "node:fs"
import * as fs from "node:fs/promises"
import * as path from "node:path"
import { hasSystemErrorCode } from "@bucketfs/errors"
import type { ListedObject } from "../../ports/store-types"
import { isMarkerEntry, isSidecarEntry } from "../markers/directory-markers"
import { statOrNull } from "../paths/existence"

type Frame = { dir: string; prefix: string }

/**
 * Walks a bucket directory and returns every object whose key starts with
 * `prefix`. Subtrees that cannot contain a match are not visited. Symbolic
 * links are ignored. The result is unordered.
 */
export async function listKeys(bucketDir: string, prefix = ""): Promise<ListedObject[]> {
  const objects: ListedObject[] = []
  const stack: Frame[] = [{ dir: bucketDir, prefix: "" }]

  while (stack.length > 0) {
    const frame = stack.pop()
    if (frame === undefined) break

    const entries = await readEntries(frame.dir)

    for (const entry of entries) {
      if (isMarkerEntry(entry.name) || isSidecarEntry(entry.name)) continue

      if (entry.isFile()) {
        const key = frame.prefix + entry.name
        if (!key.startsWith(prefix)) continue

        const stat = await statOrNull(path.join(frame.dir, entry.name))
        if (stat === null || !stat.isFile()) continue

        objects.push({ key, size: stat.size, lastModified: stat.mtime })
        continue
      }

      if (entry.isDirectory() && !entry.name.startsWith(".")) {
        const childPrefix = `${frame.prefix}${entry.name}/`
        if (!isPrefixRelated(childPrefix, prefix)) continue

        stack.push({ dir: path.join(frame.dir, entry.name), prefix: childPrefix })
      }
    }
  }

  return objects
}

/**
 * A filter ending mid-path (`a/b`) must still reach `a/`, so either side may
 * be the prefix of the other.
 */
export function isPrefixRelated(childPrefix: string, filter: string): boolean {
  if (filter === "") return true

  return childPrefix.startsWith(filter) || filter.startsWith(childPrefix)
}

async function readEntries(dir: string): Promise<Dirent[]> {
  try {
    return await fs.readdir(dir, { withFileTypes: true })
  } catch (err) {
    if (hasSystemErrorCode(err, "ENOENT", "ENOTDIR")) return []
    throw err
  }
}
