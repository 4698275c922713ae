export type EncodingErrorCode = 'Malformed' | 'OutOfRange' | 'Overflow';
export type CryptoErrorCode =
  | 'InvalidPassword'
  | 'CorruptCiphertext'
  | 'InvalidPrivateKey'
  | 'DecryptedSecretOutOfRange';
export type AbiErrorCode =
  | 'ArityMismatch'
  | 'ArgumentOutOfRange'
  | 'TruncatedOutput'
  | 'UnknownType'
  | 'UnknownFunction'
  | 'InvalidAbi';
export type UnsupportedFormatCode =
  | 'UnsupportedClassVersion'
  | 'UnsupportedKdf'
  | 'UnsupportedCipher'
  | 'UnsupportedKeystoreVersion'
  | 'MalformedKeystore'
  | 'MalformedAccount'
  | 'UnsupportedTransaction';
export type ProviderErrorCode = 'ProviderUnavailable' | 'Rejected' | 'InvalidResponse' | 'FeeEstimationFailed';
export type StorageErrorCode = 'PathExists' | 'NotFound' | 'AccountNotDeployed';

export abstract class CairnError<C extends string = string> extends Error {
  readonly code: C;

  constructor(code: C, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = new.target.name;
  }
}

/** Malformed numeric text and range violations. */
export class EncodingError extends CairnError<EncodingErrorCode> {}

/** Wrong password, corrupt ciphertext or an unusable private key. */
export class CryptoError extends CairnError<CryptoErrorCode> {}

/** Literal arguments or returned felts that do not fit the declared types. */
export class AbiMismatchError extends CairnError<AbiErrorCode> {}

export class UnsupportedFormatError extends CairnError<UnsupportedFormatCode> {}

/**
 * Opaque failure of the network provider. Timeouts are reported as
 * `ProviderUnavailable` like any other transport failure.
 */
export class ProviderError extends CairnError<ProviderErrorCode> {}

export class StorageError extends CairnError<StorageErrorCode> {}

/** Illegal transaction-builder transition. */
export class StateError extends CairnError<'IllegalTransition' | 'BuilderFailed' | 'FeeVersionMismatch'> {}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
