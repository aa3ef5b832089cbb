export type ShimErrorCode = 'INVALID_CONFIG' | 'LOCK_REENTERED';

/** opentracing shim のエラー。span 操作からは送出しない。 */
export class ShimError extends Error {
  constructor(
    message: string,
    public readonly code: ShimErrorCode,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'ShimError';
  }
}
