export type ErrorKind = 'validation' | 'conflict' | 'precondition' | 'backend';

export class ScannerError extends Error {
  readonly code: string;
  readonly kind: ErrorKind;

  constructor(code: string, kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.kind = kind;
  }
}

export class InvalidScanFormatError extends ScannerError {
  constructor(readonly raw: string) {
    super(
      'INVALID_SCAN_FORMAT',
      'validation',
      `Cannot read drum type and number from "${raw.trim()}". Expected "<DRUM_TYPE> <DRUM_NUMBER>".`
    );
  }
}

export class MissingQuantityError extends ScannerError {
  constructor(readonly drumNumber: string) {
    super('MISSING_QUANTITY', 'validation', `Standard quantity is required for drum ${drumNumber}.`);
  }
}

export class DuplicateDrumError extends ScannerError {
  constructor(
    readonly drumNumber: string,
    readonly priorPalletId: string,
    readonly priorCreatedAt: string | null,
    readonly priorMaterialCode: string
  ) {
    super(
      'DUPLICATE_DRUM',
      'conflict',
      priorPalletId
        ? `This drum was also scanned on pallet ${priorPalletId} from ${priorCreatedAt ?? 'N/A'}. Please check!`
        : 'Drum scanned twice. Please check!'
    );
  }
}

export class MaterialMismatchError extends ScannerError {
  constructor(
    readonly expectedMaterialCode: string,
    readonly labelMaterialCode: string
  ) {
    super(
      'MATERIAL_MISMATCH',
      'conflict',
      labelMaterialCode
        ? `Wrong material label. You can't add material "${labelMaterialCode}" on a pallet with material code "${expectedMaterialCode}".`
        : `Material code from the label is required for a pallet with material code "${expectedMaterialCode}".`
    );
  }
}

export class GenerationNotAllowedError extends ScannerError {
  constructor(message: string) {
    super('GENERATION_NOT_ALLOWED', 'precondition', message);
  }
}

export class PalletIdConflictError extends ScannerError {
  constructor(readonly palletId: string) {
    super(
      'PALLET_ID_CONFLICT',
      'conflict',
      `Pallet ${palletId} already exists. Check the global pallet counter.`
    );
  }
}

export class MaterialNotFoundError extends ScannerError {
  constructor(readonly materialCode: string) {
    super('MATERIAL_NOT_FOUND', 'precondition', `Material ${materialCode} is not available.`);
  }
}

export class InvalidCounterValueError extends ScannerError {
  constructor(value: string) {
    super('INVALID_COUNTER_VALUE', 'validation', `Pallet counter must be a non-negative integer, got "${value}".`);
  }
}

export class InvalidMaterialError extends ScannerError {
  constructor(message: string) {
    super('INVALID_MATERIAL', 'validation', message);
  }
}

export class InvalidEmailError extends ScannerError {
  constructor(value: string) {
    super('INVALID_EMAIL', 'validation', `"${value}" is not an email address.`);
  }
}

export class ConfigError extends ScannerError {
  constructor(message: string) {
    super('CONFIG_ERROR', 'validation', message);
  }
}

export class BackendError extends ScannerError {
  constructor(message: string, options?: { cause?: unknown; code?: string }) {
    super(options?.code ?? 'BACKEND_FAILURE', 'backend', message, { cause: options?.cause });
  }
}

export class PartialCommitError extends BackendError {
  constructor(
    message: string,
    readonly compensated: boolean,
    options?: { cause?: unknown }
  ) {
    super(
      compensated
        ? `${message} Changes already written were rolled back.`
        : `${message} Some changes could not be rolled back; check the backend data.`,
      { cause: options?.cause, code: 'PARTIAL_COMMIT' }
    );
  }
}

export function isScannerError(error: unknown): error is ScannerError {
  return error instanceof ScannerError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
