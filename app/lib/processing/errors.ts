export type MissingResource = "source" | "cover";

/**
 * Raised when the working directory does not hold exactly the resources a
 * conversion needs (one source text, one cover image per extension).
 */
export class ResourceNotFoundError extends Error {
  readonly resource: MissingResource;
  readonly directory: string;

  constructor(resource: MissingResource, directory: string, message: string) {
    super(message);
    this.name = "ResourceNotFoundError";
    this.resource = resource;
    this.directory = directory;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Raised by a package builder when pages, reading order and navigation do
 * not agree with the registered assets.
 */
export class PackageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PackageError";
  }
}
