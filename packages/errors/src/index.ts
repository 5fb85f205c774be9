export { BaseError, type BaseErrorOptions } from "./core/base-error"
export { errorChain, findInChain } from "./core/error-chain"
export { serializeError, type SerializeOptions } from "./core/serialize-error"
export {
  ConnectionError,
  isStoreError,
  MissingClientError,
  OperationAbortedError,
  SchemaError,
  UnavailableDataError,
  type StoreError,
} from "./core/store-errors"
export type { AppError, ErrorCode, ErrorContext, SerializedError, StoreErrorCode } from "./ports/error"
