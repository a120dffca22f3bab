export class TraceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TraceError";
  }
}

export type ContractSite = {
  contract: string;
  operation?: string;
};

function describeSite(site: ContractSite): string {
  return site.operation ? `${site.contract}.${site.operation}` : site.contract;
}

/** Raised while compiling a contract. The contract is never cached once this is thrown. */
export class ContractError extends TraceError {
  readonly contract: string;
  readonly operation: string | undefined;

  constructor(message: string, site: ContractSite) {
    super(`${message} (in ${describeSite(site)})`);
    this.name = "ContractError";
    this.contract = site.contract;
    this.operation = site.operation;
  }
}

export class TemplateError extends ContractError {
  constructor(
    public readonly token: string,
    public readonly template: string,
    site: ContractSite,
  ) {
    super(`Invalid format argument '${token}' in template "${template}"`, site);
    this.name = "TemplateError";
  }
}

export class ClassificationError extends ContractError {
  constructor(
    message: string,
    public readonly parameter: string,
    site: ContractSite,
  ) {
    super(message, site);
    this.name = "ClassificationError";
  }
}

/** Raised at call time when an argument cannot be rendered into the message. */
export class FormatError extends TraceError {
  constructor(
    public readonly operation: string,
    public readonly parameter: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not render argument '${parameter}' of ${operation}: ${reason}`, { cause });
    this.name = "FormatError";
  }
}
