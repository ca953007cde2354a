export const TxCodecErrorCodes = {
  InsufficientBytes: 'E_INSUFFICIENT_BYTES',
  InvalidFormat: 'E_INVALID_FORMAT',
} as const;

export type TxCodecErrorCode =
  (typeof TxCodecErrorCodes)[keyof typeof TxCodecErrorCodes];

export class TxCodecError extends Error {
  readonly code: TxCodecErrorCode;
  readonly detail: string | null;

  constructor(code: TxCodecErrorCode, message: string, detail?: string) {
    super(message);
    this.name = 'TxCodecError';
    this.code = code;
    this.detail = detail ?? null;
  }
}

export function isTxCodecError(
  error: unknown,
  code?: TxCodecErrorCode
): error is TxCodecError {
  return error instanceof TxCodecError && (code === undefined || error.code === code);
}

/**
 * Throw InsufficientBytes unless `have` covers `need`
 */
export function ensureAvailable(need: number, have: number, field: string): void {
  if (have < need) {
    throw new TxCodecError(
      TxCodecErrorCodes.InsufficientBytes,
      `Not enough bytes to read ${field}`,
      `need=${need} have=${have}`
    );
  }
}
