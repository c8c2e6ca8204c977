/**
 * Error kinds raised by the parsers, the catalogue client and the
 * requirement sources.
 *
 * Parse errors are line-local: callers skip the offending line or catalogue
 * entry. Fetch and source errors come from the I/O boundary and propagate.
 */

export class VersionParseError extends Error {
  constructor(readonly text: string) {
    super(`Invalid version: "${text}"`);
    this.name = "VersionParseError";
  }
}

export class SpecParseError extends Error {
  constructor(readonly spec: string, reason: string) {
    super(`Invalid spec "${spec}": ${reason}`);
    this.name = "SpecParseError";
  }
}

export class CatalogueFormatError extends Error {
  constructor(
    message: string,
    readonly packageName?: string,
    readonly advisoryId?: string,
  ) {
    super(message);
    this.name = "CatalogueFormatError";
  }
}

export class CatalogueFetchError extends Error {
  constructor(readonly location: string, reason: string) {
    super(`Failed to load catalogue from ${location}: ${reason}`);
    this.name = "CatalogueFetchError";
  }
}

export class SourceError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = "SourceError";
  }
}
