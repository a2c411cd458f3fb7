/**
 * Workload driver types
 * @module @replica-drill/shared/types/workload
 */

/**
 * Operation the workload driver performs
 */
export type WorkloadOperation = 'put' | 'get' | 'exist';

/**
 * Key generation mode of the driver
 */
export type KeyGenerationMode = 'random' | 'normal';

/**
 * Binary key size in bytes
 */
export type KeySize = 8 | 16;

/**
 * Which flag carries the first key index: `-f` (first) or `-s` (start)
 */
export type IndexFlag = 'first' | 'start';

export const WORKLOAD_OPERATIONS: readonly WorkloadOperation[] = ['put', 'get', 'exist'];
export const KEY_GENERATION_MODES: readonly KeyGenerationMode[] = ['random', 'normal'];
export const KEY_SIZES: readonly KeySize[] = [8, 16];

/**
 * Basic auth credentials passed through to the driver
 */
export interface Credentials {
  user: string;
  password: string;
}

/**
 * Immutable description of one driver invocation
 */
export interface Workload {
  readonly operation: WorkloadOperation;
  /** First key index */
  readonly first: number;
  /** Number of keys, starting at `first` */
  readonly count: number;
  /** Payload size in bytes */
  readonly payload: number;
  readonly keySize: KeySize;
  readonly threads?: number;
  readonly mode?: KeyGenerationMode;
  readonly host: string;
  readonly port: number;
  readonly credentials?: Credentials;
  /** Ignored for exist, which always uses `-f` */
  readonly indexFlag?: IndexFlag;
}

/**
 * Result of a put or get invocation
 */
export interface TransferResult {
  kind: 'transfer';
  workload: Workload;
  output: string;
  /** Output carries the zero-errors marker */
  errorFree: boolean;
  /** Output carries the panic marker */
  panicked: boolean;
  passed: boolean;
}

/**
 * Result of an exist invocation: `matched of total` keys found
 */
export interface ExistResult {
  kind: 'exist';
  workload: Workload;
  output: string;
  matched: number;
  total: number;
  passed: boolean;
}

export type WorkloadResult = TransferResult | ExistResult;

/**
 * Parsed `Final summary: passed/total` line of the operation tester
 */
export interface OperationSummary {
  output: string;
  passed: number;
  total: number;
  complete: boolean;
}
