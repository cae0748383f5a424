export * from './constants'
export * from './types/common'
export * from './types/product'
export * from './types/payment'
export * from './types/purchase'
export * from './utils/crypto'
export * from './utils/validation'
