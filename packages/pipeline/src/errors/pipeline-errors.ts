/**
 * Thrown when a document id does not resolve, after lookup retries.
 */
export class DocumentNotFoundError extends Error {
  public readonly name = 'DocumentNotFoundError';

  constructor(public readonly documentId: string) {
    super(`Document ${documentId} not found`);
  }
}

export class PageNotFoundError extends Error {
  public readonly name = 'PageNotFoundError';

  constructor(public readonly pageId: string) {
    super(`Page ${pageId} not found`);
  }
}

/** One failed field of a preset or configuration payload */
export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Preset input rejected by schema validation, or a preset that does not
 * exist.
 */
export class PresetValidationError extends Error {
  public readonly name = 'PresetValidationError';

  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = [],
  ) {
    super(
      issues.length > 0
        ? `${message}: ${issues.map((i) => `${i.path || '(root)'} ${i.message}`).join('; ')}`
        : message,
    );
  }
}

/**
 * Environment variables that do not pass validation.
 */
export class ConfigurationError extends Error {
  public readonly name = 'ConfigurationError';

  constructor(public readonly issues: ValidationIssue[]) {
    super(
      `Invalid configuration: ${issues.map((i) => `${i.path} ${i.message}`).join('; ')}`,
    );
  }
}

/**
 * Search parameters that do not pass validation.
 */
export class SearchQueryError extends Error {
  public readonly name = 'SearchQueryError';

  constructor(public readonly issues: ValidationIssue[]) {
    super(
      `Invalid search query: ${issues.map((i) => `${i.path} ${i.message}`).join('; ')}`,
    );
  }
}
