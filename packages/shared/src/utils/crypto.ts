import { randomBytes } from 'crypto'

export function generateUrlSafeToken(bytes = 16): string {
  return randomBytes(bytes).toString('base64url')
}
