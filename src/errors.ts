export class FlagError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

export class ConfigurationError extends FlagError {}

export class CannotSerializeContextError extends FlagError {
  constructor(received: string, options?: ErrorOptions) {
    super(`Cannot serialize context of type "${received}".`, options)
  }
}

export class InvalidVariantWeightsError extends FlagError {
  static mustSumTo100(feature: string, total: number): InvalidVariantWeightsError {
    return new InvalidVariantWeightsError(
      `Variant weights for "${feature}" must sum to 100, got ${total}.`
    )
  }
}

export class EmptyVariantWeightsError extends FlagError {
  constructor(feature: string) {
    super(`Variant weights for "${feature}" cannot be empty.`)
  }
}

export class GroupNotFoundError extends FlagError {
  constructor(readonly group: string) {
    super(`Feature group "${group}" does not exist.`)
  }
}
