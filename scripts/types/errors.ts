/**
 * Error classes.
 */
import { logger } from "../logger.ts";

/**
 * Base class of every error the launcher raises.
 */
export class AppError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "AppError";
  }
}

/**
 * Config file errors.
 */
export class ConfigError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

/**
 * File system errors.
 */
export class FileError extends AppError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "FileError";
  }
}

/**
 * HTTP errors.
 */
export class NetworkError extends AppError {
  constructor(
    message: string,
    public readonly url?: string,
    public readonly statusCode?: number,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "NetworkError";
  }
}

/**
 * Invalid user input.
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ValidationError";
  }
}

/**
 * A requested id is not in the index.
 */
export class NotFoundError extends AppError {
  constructor(message: string, public readonly id: string, cause?: unknown) {
    super(message, cause);
    this.name = "NotFoundError";
  }
}

/**
 * Game version missing from the version manifest.
 */
export class VersionNotFoundError extends NotFoundError {
  constructor(versionId: string) {
    super(`Minecraft version ${versionId} was not found in the version manifest.`, versionId);
    this.name = "VersionNotFoundError";
  }
}

/**
 * Mod loader version missing from the loader index.
 */
export class LoaderVersionNotFoundError extends NotFoundError {
  constructor(public readonly loader: string, version: string) {
    super(`${loader} version ${version} was not found in the loader index.`, version);
    this.name = "LoaderVersionNotFoundError";
  }
}

/**
 * Game version without a dedicated server download.
 */
export class ServerNotFoundError extends NotFoundError {
  constructor(versionId: string) {
    super(`Minecraft version ${versionId} does not include a server download.`, versionId);
    this.name = "ServerNotFoundError";
  }
}

/**
 * No instance manifest in the directory.
 */
export class InstanceNotFoundError extends NotFoundError {
  constructor(name: string, public readonly path: string) {
    super(`Instance ${name} does not exist (${path}).`, name);
    this.name = "InstanceNotFoundError";
  }
}

/**
 * Upstream data that does not have the expected shape.
 */
export class MalformedDataError extends AppError {
  constructor(
    message: string,
    public readonly raw?: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "MalformedDataError";
  }
}

export class InvalidLibraryNameError extends MalformedDataError {
  constructor(name: string) {
    super(`Invalid library name: ${name}`, name);
    this.name = "InvalidLibraryNameError";
  }
}

export class InvalidLibraryPathError extends MalformedDataError {
  constructor(path: string) {
    super(`Invalid library path: ${path}`, path);
    this.name = "InvalidLibraryPathError";
  }
}

export class InvalidModLoaderIdError extends MalformedDataError {
  constructor(id: string) {
    super(`Invalid mod loader id: ${id}`, id);
    this.name = "InvalidModLoaderIdError";
  }
}

/**
 * No download can be determined for a library.
 */
export class LibraryResolutionError extends MalformedDataError {
  constructor(message: string, public readonly library: string) {
    super(message, library);
    this.name = "LibraryResolutionError";
  }
}

/**
 * The catalog returned a different number of files than mods.
 */
export class CatalogMismatchError extends AppError {
  constructor(
    public readonly fileListLength: number,
    public readonly modListLength: number,
  ) {
    super(
      `Catalog returned ${fileListLength} files but ${modListLength} mods; refusing to pair them.`,
    );
    this.name = "CatalogMismatchError";
  }
}

/**
 * Formats an error and its cause chain.
 */
export function formatError(error: unknown): string {
  if (error instanceof AppError) {
    const parts = [error.message];
    if (error.cause) {
      parts.push(`Caused by: ${formatError(error.cause)}`);
    }
    return parts.join("\n");
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Logs an error with an optional context prefix.
 */
export function logError(
  error: unknown,
  context?: string,
): void {
  const prefix = context ? `[${context}] ` : "";
  logger.error(`${prefix}${formatError(error)}`);
}

/**
 * Whether an error is ENOENT.
 */
export function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
