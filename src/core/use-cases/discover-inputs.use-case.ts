import { statSync } from "node:fs";
import { resolve } from "node:path";
import { InputNotFoundError, errnoCode, InputReadError } from "../domain/errors.js";
import { listFilesRecursive } from "../../infrastructure/utils/storage.utils.js";

export interface DiscoverInputsRequest {
  /** Files or directories, as given on the command line */
  paths: string[];
}

/**
 * Expands input arguments into the list of log files to parse. Directories
 * are walked recursively; the same file named twice is parsed once.
 */
export class DiscoverInputsUseCase {
  execute(request: DiscoverInputsRequest): string[] {
    const files: string[] = [];
    const seen = new Set<string>();
    const add = (file: string) => {
      const key = resolve(file);
      if (seen.has(key)) return;
      seen.add(key);
      files.push(file);
    };

    for (const path of request.paths) {
      let isDirectory: boolean;
      try {
        isDirectory = statSync(path).isDirectory();
      } catch (e) {
        if (errnoCode(e) === "ENOENT" || errnoCode(e) === "ENOTDIR") {
          throw new InputNotFoundError(path, e);
        }
        throw new InputReadError(path, e);
      }
      if (!isDirectory) {
        add(path);
        continue;
      }
      try {
        listFilesRecursive(path).forEach(add);
      } catch (e) {
        throw new InputReadError(path, e);
      }
    }

    if (files.length === 0) {
      throw new InputNotFoundError(request.paths.join(", "));
    }
    return files;
  }
}
