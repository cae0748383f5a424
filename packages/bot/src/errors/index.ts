// packages/bot/src/errors/index.ts - Shop error taxonomy

export type ShopErrorCode = 'NOT_FOUND' | 'UNAUTHORIZED' | 'INVALID_INPUT'

/**
 * Base class for failures that end at the handler boundary with a
 * user-facing denial message instead of a system error.
 */
export abstract class ShopError extends Error {
  abstract readonly code: ShopErrorCode

  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

export class NotFoundError extends ShopError {
  readonly code = 'NOT_FOUND'

  constructor(
    readonly resource: 'product' | 'plan' | 'purchase' | 'pending_purchase',
    readonly key?: string | number
  ) {
    super(key === undefined ? `${resource} not found` : `${resource} not found: ${key}`)
  }
}

export class UnauthorizedError extends ShopError {
  readonly code = 'UNAUTHORIZED'

  constructor(readonly callerId: number) {
    super(`caller ${callerId} is not an administrator`)
  }
}

export class InvalidInputError extends ShopError {
  readonly code = 'INVALID_INPUT'

  constructor(
    readonly reason: 'empty_receipt' | 'unknown_gateway',
    message: string
  ) {
    super(message)
  }
}

export function isShopError(error: unknown): error is ShopError {
  return error instanceof ShopError
}
