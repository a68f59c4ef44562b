export class SpokehubError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SpokehubError";
  }
}

/** Invalid apis.yaml. Fatal at startup. */
export class ConfigError extends SpokehubError {
  constructor(
    message: string,
    public readonly groupIndex?: number,
    public readonly groupName?: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export class CatalogLookupError extends SpokehubError {
  constructor(
    message: string,
    public readonly packagePath: string,
    public readonly typeName?: string
  ) {
    super(message);
    this.name = "CatalogLookupError";
  }
}

export class ConversionGenerationError extends SpokehubError {
  constructor(
    message: string,
    public readonly group: string,
    public readonly version: string,
    public readonly kind: string
  ) {
    super(`${group}/${version} ${kind}: ${message}`);
    this.name = "ConversionGenerationError";
  }
}

export type VersionSource = "body" | "accept" | "default";

export class RequestVersionError extends SpokehubError {
  constructor(
    public readonly requested: string,
    public readonly supported: string[],
    public readonly source: VersionSource
  ) {
    super(
      `Unsupported API version "${requested}" (supported: ${supported.join(", ")})`
    );
    this.name = "RequestVersionError";
  }
}

export class RequestDecodeError extends SpokehubError {
  constructor(
    message: string,
    public readonly path: string = ""
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = "RequestDecodeError";
  }
}

/** The caller went away before dispatch; nothing reached the handler. */
export class RequestAbortedError extends SpokehubError {
  constructor() {
    super("Request aborted before dispatch");
    this.name = "RequestAbortedError";
  }
}

/** A generated converter failed; points at drift between plans and config. */
export class RuntimeConversionError extends SpokehubError {
  constructor(
    message: string,
    public readonly path: string = ""
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = "RuntimeConversionError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
