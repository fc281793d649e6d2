import type { ErrorMappingsConfig } from "@bucketfs/server"

const STORE_CONTEXT_FIELDS = ["operation", "bucket", "key"] as const

export const errorMappings: ErrorMappingsConfig = {
  mappings: {
    bucket_not_found: { status: 404 },
    object_not_found: { status: 404 },
    bucket_already_exists: { status: 409 },
    bucket_not_empty: { status: 409 },
    invalid_bucket_name: { status: 400 },
    invalid_key: { status: 400 },
    permission_denied: { status: 500, message: "Permission denied by the storage backend" },
    io_failure: { status: 500, message: "Storage operation failed" },
    validation_error: { status: 422 },
  },

  transformContext: (error) => {
    const extra: Record<string, unknown> = {}

    for (const field of STORE_CONTEXT_FIELDS) {
      const value = error.context[field]
      if (typeof value === "string") extra[field] = value
    }

    return extra
  },
}
