// Errors raised for malformed semantic input (as opposed to modelling mistakes,
// which are reported as validation issues)

export class SemanticLoadError extends Error {
  constructor(
    message: string,
    readonly source: string
  ) {
    super(message);
    this.name = "SemanticLoadError";
  }
}

export class SemanticContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SemanticContractError";
  }
}
