export class MissingCredentialError extends Error {
  readonly variable: string;
  constructor(variable: string) {
    super(`Missing required env var: ${variable}`);
    this.name = "MissingCredentialError";
    this.variable = variable;
  }
}

export class DocumentConversionError extends Error {
  readonly sourcePath: string;
  constructor(sourcePath: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to extract document content: ${message}`, options);
    this.name = "DocumentConversionError";
    this.sourcePath = sourcePath;
  }
}

export class SummaryExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SummaryExtractionError";
  }
}

export class TemplateNotFoundError extends Error {
  readonly templatePath: string;
  readonly available: string[];
  constructor(templatePath: string, available: string[], message: string) {
    super(message);
    this.name = "TemplateNotFoundError";
    this.templatePath = templatePath;
    this.available = available;
  }
}

export class NoUsableGameSpecError extends Error {
  readonly attempts: number;
  constructor(attempts: number) {
    super(`No usable game structure was produced in ${attempts} attempt(s); nothing to build.`);
    this.name = "NoUsableGameSpecError";
    this.attempts = attempts;
  }
}

/** Errors whose message alone explains the failure to an operator. */
export function isKnownPipelineError(err: unknown): boolean {
  return (
    err instanceof MissingCredentialError ||
    err instanceof DocumentConversionError ||
    err instanceof SummaryExtractionError ||
    err instanceof TemplateNotFoundError ||
    err instanceof NoUsableGameSpecError
  );
}
