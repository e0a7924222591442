/**
 * Error taxonomy shared by the DSL and every backend.
 *
 * Messages always carry the structural repr of the offending node, since nodes
 * have no source-location metadata.
 */

/** The DSL usage is structurally invalid. Raised eagerly at construction time. */
export class GrammarError extends Error {
  constructor(message: string, public readonly subject?: string) {
    super(message);
    this.name = "GrammarError";
  }
}

/** A native value could not be converted to the requested kind. */
export class CastError extends Error {
  constructor(
    message: string,
    public readonly kind: string,
    public readonly value: unknown
  ) {
    super(message);
    this.name = "CastError";
  }
}

/**
 * No backend symbol is available for a node. Inside a bypass this only means
 * "keep the default translation"; anywhere else it is fatal.
 */
export class UnprovisionedError extends Error {
  constructor(message: string, public readonly subject: string) {
    super(message);
    this.name = "UnprovisionedError";
  }
}

/** The backend recognizes the node but cannot encode it. */
export class UnsupportedError extends Error {
  constructor(message: string, public readonly subject: string) {
    super(message);
    this.name = "UnsupportedError";
  }
}

/** Parser context stack misuse (symbol leaks, premature fetch, empty context). */
export class ContainerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ContainerError";
  }
}
