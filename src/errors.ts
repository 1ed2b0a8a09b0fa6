export class DuplicateError extends Error {
  public readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "DuplicateError";
    this.code = code;
  }
}

export class NotFoundError extends DuplicateError {
  constructor(message: string) {
    super("not_found", message);
    this.name = "NotFoundError";
  }
}

export class GatewayError extends DuplicateError {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly reason?: string,
  ) {
    super("gateway_error", message);
    this.name = "GatewayError";
  }
}

export class ManifestCorruptError extends DuplicateError {
  constructor(
    public readonly containerId: string,
    public readonly problems: string[],
  ) {
    super("manifest_corrupt", `manifest in ${containerId} is corrupt: ${problems.join("; ")}`);
    this.name = "ManifestCorruptError";
  }
}

export class AlreadyManagedError extends DuplicateError {
  constructor(containerId: string) {
    super("already_managed", `container ${containerId} already has a manifest`);
    this.name = "AlreadyManagedError";
  }
}

export class DuplicateOriginMappingError extends DuplicateError {
  constructor(sourceId: string) {
    super("duplicate_origin_mapping", `source ${sourceId} is already mapped in this manifest`);
    this.name = "DuplicateOriginMappingError";
  }
}

export class OriginMismatchError extends DuplicateError {
  constructor(containerId: string, expected: string, actual: string) {
    super(
      "origin_mismatch",
      `container ${containerId} was duplicated from ${actual}, not from ${expected}`,
    );
    this.name = "OriginMismatchError";
  }
}

export class SourceNotFoundError extends DuplicateError {
  constructor(message: string) {
    super("source_not_found", message);
    this.name = "SourceNotFoundError";
  }
}

export class DestinationParentNotFoundError extends DuplicateError {
  constructor(message: string) {
    super("destination_parent_not_found", message);
    this.name = "DestinationParentNotFoundError";
  }
}

export class ConfigError extends DuplicateError {
  constructor(
    message: string,
    public readonly problems: string[] = [],
  ) {
    super("config_error", message);
    this.name = "ConfigError";
  }
}

export class AuthError extends DuplicateError {
  constructor(message: string) {
    super("auth_error", message);
    this.name = "AuthError";
  }
}

export function errorCode(error: unknown): string {
  return error instanceof DuplicateError ? error.code : "unexpected_error";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
