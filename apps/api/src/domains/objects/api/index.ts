import { type Application, createRouter } from "@bucketfs/server"
import type { ObjectStorePort } from "@bucketfs/store"
import type { ApiModule } from "../../../app/routes/register-routes"
import { deleteObjectByQueryHandler, deleteObjectHandler } from "./delete-object.handler"
import { downloadObjectByQueryHandler, downloadObjectHandler } from "./download-object.handler"
import { listObjectsHandler } from "./list-objects.handler"
import { objectMetadataByQueryHandler, objectMetadataHandler } from "./object-metadata.handler"
import { uploadObjectHandler } from "./upload-object.handler"

export type ObjectModuleDeps = {
  store: ObjectStorePort
}

/**
 * Keys may contain slashes, so path routes capture the rest of the path.
 * `/metadata` is registered first and wins over a key ending in `/metadata`;
 * the `?object_key=` routes reach such keys.
 */
export function createObjectsModule(deps: ObjectModuleDeps): ApiModule {
  return {
    name: "objects",
    register: (api: Application) => {
      const objects = createRouter()

      objects.post("/:bucket/objects", uploadObjectHandler(deps))
      objects.get("/:bucket/objects", listObjectsHandler(deps))
      objects.delete("/:bucket/objects", deleteObjectByQueryHandler(deps))

      objects.get("/:bucket/objects/:key{.+}/metadata", objectMetadataHandler(deps))
      objects.get("/:bucket/objects/:key{.+}", downloadObjectHandler(deps))
      objects.delete("/:bucket/objects/:key{.+}", deleteObjectHandler(deps))

      objects.get("/:bucket/object/metadata", objectMetadataByQueryHandler(deps))
      objects.get("/:bucket/object", downloadObjectByQueryHandler(deps))

      api.route("/", objects)
    },
  }
}
