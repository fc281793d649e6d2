import { z } from "zod/mini"

export const createBucketRequestSchema = z.object({
  name: z.string().check(z.minLength(1, { error: "Bucket name cannot be empty" })),
})

export const bucketParamsSchema = z.object({
  bucket: z.string().check(z.minLength(1)),
})

export const deleteBucketQuerySchema = z.object({
  force: z._default(z.stringbool(), false),
})

export const createDirectoryQuerySchema = z.object({
  directory_path: z.string().check(
    z.minLength(1, { error: "directory_path is required" }),
  ),
})

export type CreateBucketRequest = z.infer<typeof createBucketRequestSchema>

export type BucketResponse = {
  name: string
  creation_date: string
}

export type CreateBucketResponse = {
  message: string
  bucket: string
  creation_date: string
}

export type ListBucketsResponse = {
  buckets: BucketResponse[]
}

export type HeadBucketResponse = {
  message: string
  bucket: string
  creation_date: string
}

export type DeleteBucketResponse = {
  message: string
  force_applied: boolean
}

export type CreateDirectoryResponse = {
  message: string
  bucket: string
  directory: string
  creation_date: string
}
