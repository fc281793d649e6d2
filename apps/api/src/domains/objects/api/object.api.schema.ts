import { z } from "zod/mini"

export const bucketParamsSchema = z.object({
  bucket: z.string().check(z.minLength(1)),
})

export const objectParamsSchema = z.object({
  bucket: z.string().check(z.minLength(1)),
  key: z.string().check(z.minLength(1)),
})

export const objectKeyQuerySchema = z.object({
  object_key: z.string().check(z.minLength(1, { error: "object_key is required" })),
})

export const listObjectsQuerySchema = z.object({
  prefix: z.optional(z.string()),
})

/**
 * Multipart upload. `key` wins over the file's own name, which cannot carry
 * slashes. `json` may hold `{ "metadata": { ... } }`.
 */
export const uploadObjectFormSchema = z.object({
  file: z.file({ error: "file is required" }),
  key: z.optional(z.string()),
  json: z.optional(z.string()),
  content_type: z.optional(z.string()),
})

export type UploadObjectForm = z.infer<typeof uploadObjectFormSchema>

export type UploadObjectResponse = {
  key: string
  size: number
  bucket: string
  content_type: string | null
  metadata: Record<string, unknown>
}

export type ObjectSummaryResponse = {
  key: string
  size: number
  last_modified: string
}

export type ListObjectsResponse = {
  objects: ObjectSummaryResponse[]
}

export type ObjectMetadataResponse = {
  metadata: Record<string, unknown>
}

export type DeleteObjectResponse = {
  message: string
  bucket: string
  key: string
}
