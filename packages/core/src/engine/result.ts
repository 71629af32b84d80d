/**
 * Result codes returned by every protocol-engine operation.
 * Zero is success; anything else is surfaced as the run's failure status.
 */
export const ResultCode = {
  SUCCESS: 0,
  MALLOC_FAIL: 1,
  NO_CTX: 2,
  TRANSPORT_FAIL: 3,
  JSON_ERR: 4,
  UNSUPPORTED_OP: 5,
  CLEANUP_FAIL: 6,
  KAT_DOWNLOAD_RETRY: 7,
  RETRY_OPERATION: 8,
  INVALID_ARG: 9,
  MISSING_ARG: 10,
  CRYPTO_MODULE_FAIL: 11,
  NO_CAP: 12,
  MALFORMED_JSON: 13,
  DATA_TOO_LARGE: 14,
  DUP_CIPHER: 15,
  TOTP_FAIL: 16,
  CTX_NOT_EMPTY: 17,
  JWT_MISSING: 18,
  JWT_EXPIRED: 19,
  JWT_INVALID: 20,
  INTERNAL_ERR: 21,
} as const;

export type ResultCode = (typeof ResultCode)[keyof typeof ResultCode];

const DESCRIPTIONS: Record<ResultCode, string> = {
  [ResultCode.SUCCESS]: 'success',
  [ResultCode.MALLOC_FAIL]: 'error allocating memory',
  [ResultCode.NO_CTX]: 'no session context supplied',
  [ResultCode.TRANSPORT_FAIL]: 'error exchanging data with server',
  [ResultCode.JSON_ERR]: 'error using JSON parser',
  [ResultCode.UNSUPPORTED_OP]: 'unsupported operation',
  [ResultCode.CLEANUP_FAIL]: 'error cleaning up session resources',
  [ResultCode.KAT_DOWNLOAD_RETRY]: 'vectors not ready yet, retry later',
  [ResultCode.RETRY_OPERATION]: 'server asked to retry the operation',
  [ResultCode.INVALID_ARG]: 'invalid argument',
  [ResultCode.MISSING_ARG]: 'missing argument',
  [ResultCode.CRYPTO_MODULE_FAIL]: 'error from crypto module processing a vector set',
  [ResultCode.NO_CAP]: 'no capabilities registered for this session',
  [ResultCode.MALFORMED_JSON]: 'JSON did not match the expected structure',
  [ResultCode.DATA_TOO_LARGE]: 'data too large',
  [ResultCode.DUP_CIPHER]: 'duplicate cipher, may have already registered',
  [ResultCode.TOTP_FAIL]: 'failed to generate two-factor token',
  [ResultCode.CTX_NOT_EMPTY]: 'session context was already in use',
  [ResultCode.JWT_MISSING]: 'session token missing',
  [ResultCode.JWT_EXPIRED]: 'session token expired',
  [ResultCode.JWT_INVALID]: 'session token invalid',
  [ResultCode.INTERNAL_ERR]: 'unexpected internal error',
};

export function isResultCode(value: number): value is ResultCode {
  return Object.hasOwn(DESCRIPTIONS, value);
}

export function describeResult(code: number): string {
  return isResultCode(code) ? DESCRIPTIONS[code] : `unknown result code ${code}`;
}
