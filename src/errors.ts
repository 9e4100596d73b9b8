export class NameGenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NameGenError";
  }
}

/** The word data is empty, malformed, or could not be read. */
export class CatalogIntegrityError extends NameGenError {
  source: string;

  constructor(source: string, message: string) {
    super(`${source}: ${message}`);
    this.name = "CatalogIntegrityError";
    this.source = source;
  }
}

export class InvalidSeedError extends NameGenError {
  value: string;

  constructor(value: string, reason: string) {
    super(`Invalid seed ${value}: ${reason}`);
    this.name = "InvalidSeedError";
    this.value = value;
  }
}
