export const TLVErrorCode = {
  InvalidTag: "INVALID_TAG",
  TagIsRFU: "TAG_IS_RFU",
  TruncatedInput: "TRUNCATED_INPUT",
  InvalidLength: "INVALID_LENGTH",
  Inconsistent: "INCONSISTENT",
  InvalidInput: "INVALID_INPUT",
  ParseIntError: "PARSE_INT_ERROR",
  DepthExceeded: "DEPTH_EXCEEDED",
} as const;
export type TLVErrorCode = (typeof TLVErrorCode)[keyof typeof TLVErrorCode];

const DEFAULT_MESSAGES: Record<TLVErrorCode, string> = {
  INVALID_TAG: "Invalid tag encountered",
  TAG_IS_RFU: "Tag is reserved for future use",
  TRUNCATED_INPUT: "Input too short",
  INVALID_LENGTH: "Invalid length value",
  INCONSISTENT: "Inconsistent (tag, value) pair",
  INVALID_INPUT: "Invalid input",
  PARSE_INT_ERROR: "Error parsing input as integer",
  DEPTH_EXCEEDED: "Maximum nesting depth exceeded",
};

/**
 * Every failure raised while reading, building or validating TLV data.
 * `offset` is the cursor position where the problem was detected, or -1.
 */
export class TLVError extends Error {
  public constructor(
    public readonly code: TLVErrorCode,
    detail?: string,
    public readonly offset: number = -1,
  ) {
    const base = DEFAULT_MESSAGES[code];
    const text = detail ? `${base}: ${detail}` : base;
    super(offset >= 0 ? `${text} (at offset ${offset})` : text);
    this.name = "TLVError";
  }
}

export function isTLVError(err: unknown, code?: TLVErrorCode): err is TLVError {
  return err instanceof TLVError && (code === undefined || err.code === code);
}
