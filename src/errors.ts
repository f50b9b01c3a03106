import type { ServiceName } from "./config.js";

/**
 * Thrown when a caller hands an importer data that breaks its contract,
 * e.g. an empty container or a photo pointing at an album that was never registered.
 */
export class ImportPreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ImportPreconditionError";
  }
}

export class FetchError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, status?: number) {
    super(message);
    this.name = "FetchError";
    this.url = url;
    this.status = status;
  }
}

export class VendorApiError extends Error {
  readonly vendor: ServiceName;
  readonly code?: string | number;

  constructor(vendor: ServiceName, message: string, code?: string | number) {
    super(message);
    this.name = "VendorApiError";
    this.vendor = vendor;
    this.code = code;
  }
}

export class AuthError extends Error {
  readonly vendor: ServiceName;

  constructor(vendor: ServiceName, message: string) {
    super(message);
    this.name = "AuthError";
    this.vendor = vendor;
  }
}

export class JobStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JobStoreError";
  }
}

export class ContainerFormatError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ContainerFormatError";
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
