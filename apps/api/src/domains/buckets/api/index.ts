import { type Application, createRouter } from "@bucketfs/server"
import type { ObjectStorePort } from "@bucketfs/store"
import type { ApiModule } from "../../../app/routes/register-routes"
import { createBucketHandler } from "./create-bucket.handler"
import { createDirectoryHandler } from "./create-directory.handler"
import { deleteBucketHandler } from "./delete-bucket.handler"
import { headBucketHandler } from "./head-bucket.handler"
import { listBucketsHandler } from "./list-buckets.handler"

export type BucketModuleDeps = {
  store: ObjectStorePort
}

export function createBucketsModule(deps: BucketModuleDeps): ApiModule {
  return {
    name: "buckets",
    register: (api: Application) => {
      const buckets = createRouter()

      buckets.post("/", createBucketHandler(deps))
      buckets.get("/", listBucketsHandler(deps))
      buckets.get("/:bucket", headBucketHandler(deps))
      buckets.delete("/:bucket", deleteBucketHandler(deps))
      buckets.post("/:bucket/directories", createDirectoryHandler(deps))

      api.route("/", buckets)
    },
  }
}
