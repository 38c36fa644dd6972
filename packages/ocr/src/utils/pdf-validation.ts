import { PDF_SIGNATURE } from '../config/constants';
import { InvalidPdfError } from '../errors/pdf-errors';

/**
 * Whether `bytes` is non-empty and begins with the PDF signature.
 */
export function isPdfBytes(bytes: Uint8Array): boolean {
  return (
    bytes.length >= PDF_SIGNATURE.length &&
    Buffer.from(bytes.subarray(0, PDF_SIGNATURE.length)).toString('latin1') ===
      PDF_SIGNATURE
  );
}

/**
 * @throws InvalidPdfError naming `source` when the bytes are not a PDF
 */
export function assertPdfBytes(bytes: Uint8Array, source: string): void {
  if (bytes.length === 0) {
    throw new InvalidPdfError(source, 'empty');
  }
  if (!isPdfBytes(bytes)) {
    throw new InvalidPdfError(source, 'missing-signature');
  }
}
