import type { Config } from "../../core/domain/entities/config.entity.js";
import type { Scope } from "../../core/domain/entities/object-entry.entity.js";
import type { IObjectStore } from "../../core/domain/services/object-store.service.js";
import type { IReporter } from "../../core/domain/services/reporter.service.js";
import { ConfigurationError } from "../../core/domain/errors.js";
import { LocalObjectStore } from "./local-object-store.service.js";
import { S3ObjectStore, createS3Client } from "./s3-object-store.service.js";

export class ObjectStoreFactory {
  static create(scope: Scope, config: Config, reporter?: IReporter): IObjectStore {
    if (scope.kind === "local") {
      return new LocalObjectStore(scope.root, {
        onSkip: (path, reason) => reporter?.debug(`Skipping ${reason}: ${path}`),
      });
    }
    const alias = config.aliases[scope.alias];
    if (!alias) {
      throw new ConfigurationError(`Unknown alias: ${scope.alias}`);
    }
    return new S3ObjectStore(createS3Client(alias), scope);
  }
}
