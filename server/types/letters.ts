/**
 * Letter Pipeline Types
 *
 * Data model shared by extraction, rendering, batch generation and dispatch.
 */

// ============================================================================
// Extraction
// ============================================================================

export interface Proposal {
  /** Numeric suffix of the NoProp<i> column the proposal came from */
  slot: number;
  number: string;
  title: string;
  scheme: string;
  /** null when the cell is blank or not a number */
  amount: number | null;
  /** Trimmed cell text, shown when the amount is not numeric */
  amountText: string;
}

export interface PersonRecord {
  id: string;
  name: string;
  unit: string;
  account: string;
  bank: string;
  email: string | null;
  proposals: readonly Proposal[];
  /** 1-based data row in the source sheet */
  rowNumber: number;
}

export type SkipReason = 'missing_identity' | 'duplicate_id';

export interface SkippedRow {
  rowNumber: number;
  reason: SkipReason;
  missing: string[];
}

// ============================================================================
// Generation
// ============================================================================

export type FailureReason =
  | 'ConverterNotFound'
  | 'ConversionTimeout'
  | 'ConversionFailed'
  | 'RenderFailed';

export type GenerationOutcome =
  | {
      recordId: string;
      name: string;
      status: 'SUCCESS';
      documentName: string;
      documentPath: string;
    }
  | {
      recordId: string;
      name: string;
      status: 'FAILED';
      reason: FailureReason;
      detail: string;
    };

// ============================================================================
// Dispatch
// ============================================================================

export type DispatchStatus = 'OK' | 'FAIL' | 'SKIP' | 'DRY-RUN';

export interface DispatchOutcome {
  recordId: string;
  name: string;
  address: string;
  status: DispatchStatus;
  timestamp: string;
  detail: string;
  messageId?: string;
}

export type DispatchMode = 'dry_run' | 'live';
