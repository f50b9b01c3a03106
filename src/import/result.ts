import { AuthError, FetchError, ImportPreconditionError, JobStoreError } from "../errors.js";
import type { PhotosContainerResource } from "../models/photos.js";
import type { ImportErrorKind, ImportResult } from "./types.js";

export function importOk(photosImported: number, albumsCreated: number): ImportResult {
  return { status: "ok", photosImported, albumsCreated };
}

export function importFailed(kind: ImportErrorKind, message: string): ImportResult {
  return { status: "error", kind, message };
}

export function classifyError(error: unknown): ImportErrorKind {
  if (error instanceof AuthError) return "auth";
  if (error instanceof FetchError || error instanceof JobStoreError) return "io";
  return "vendor";
}

/**
 * Turns an operational failure into an error result. Contract violations are
 * rethrown: they are the caller's bug, not a failed import.
 */
export function toImportFailure(error: unknown, prefix: string): ImportResult {
  if (error instanceof ImportPreconditionError) {
    throw error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return importFailed(classifyError(error), `${prefix}${message}`);
}

export function checkHasData(data: PhotosContainerResource): void {
  if (data.albums === undefined && data.photos === undefined) {
    throw new ImportPreconditionError("Error: There is no data to import");
  }
}
