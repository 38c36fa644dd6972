/**
 * Thrown when a PDF cannot be opened or reports no pages.
 * Fatal for a document: nothing downstream can run without a page count.
 */
export class PdfOpenError extends Error {
  public readonly name = 'PdfOpenError';

  constructor(
    public readonly pdfPath: string,
    reason: string,
  ) {
    super(`Cannot open PDF ${pdfPath}: ${reason}`);
  }
}

/**
 * Thrown when bytes that should hold a PDF are empty or lack the `%PDF` signature.
 */
export class InvalidPdfError extends Error {
  public readonly name = 'InvalidPdfError';

  constructor(
    public readonly source: string,
    reason: 'empty' | 'missing-signature',
  ) {
    super(
      reason === 'empty'
        ? `PDF ${source} is empty`
        : `PDF ${source} does not start with %PDF`,
    );
  }
}
