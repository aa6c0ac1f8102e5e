export { BaseError, type BaseErrorOptions } from "./core/base-error"
export { type SerializeOptions, serializeError } from "./core/serialize-error"
export { errorChain, findInChain } from "./core/utils/error-chain"
export type * from "./ports/error"
