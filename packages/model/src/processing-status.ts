/**
 * Lifecycle status shared by documents and pages.
 *
 * `pending` and `processing` are transient; `completed` and `failed` are
 * terminal until an explicit reprocess resets the record to `pending`.
 */
export type ProcessingStatus = 'pending' | 'processing' | 'completed' | 'failed';

export const TERMINAL_STATUSES: readonly ProcessingStatus[] = [
  'completed',
  'failed',
] as const;

export function isTerminalStatus(status: ProcessingStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}
