import path from "node:path";
import {
  FolderStorageProvider,
  GoogleAuth,
  GoogleDriveStorageProvider,
  type Logger,
  type StorageProvider,
} from "@dirsync/core-application";

import type { DirsyncConfig } from "./config";

/** Builds the remote store named by the configuration; google-drive signs in first. */
export async function createStorageProvider(
  config: Pick<DirsyncConfig, "cloudProvider" | "credentials">,
  logger: Logger
): Promise<StorageProvider> {
  switch (config.cloudProvider) {
    case "folder":
      return new FolderStorageProvider(config.credentials);

    case "google-drive": {
      // saved tokens live next to the OAuth client file
      const auth = new GoogleAuth(
        { tokenDirAbs: path.dirname(config.credentials), credentialsPathAbs: config.credentials },
        logger
      );
      return new GoogleDriveStorageProvider(await auth.getAuthorizedClient());
    }
  }
}
