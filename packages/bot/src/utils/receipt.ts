// packages/bot/src/utils/receipt.ts - Receipt message parsing
import { PROOF_LABELS, parsePositiveInt } from '@fileshop/shared'

export interface Receipt {
  purchaseId?: number
  proof: string
}

function isProofLabel(word: string): boolean {
  const lowered = word.toLowerCase()
  return PROOF_LABELS.some(label => label === lowered)
}

/**
 * Accepted shapes:
 *   "<label> <id> <proof>"
 *   "<id> <proof>"
 *   "<proof>"  (any other text; the last word is the proof)
 * Returns null for blank text.
 */
export function parseReceipt(text: string): Receipt | null {
  const parts = text.trim().split(/\s+/).filter(part => part.length > 0)
  const last = parts[parts.length - 1]
  if (last === undefined) return null

  const [first, second, third] = parts
  if (first !== undefined && second !== undefined && third !== undefined && isProofLabel(first)) {
    const purchaseId = parsePositiveInt(second)
    if (purchaseId !== null) {
      return { purchaseId, proof: third }
    }
  }

  if (parts.length === 2 && first !== undefined && second !== undefined) {
    const purchaseId = parsePositiveInt(first)
    if (purchaseId !== null) {
      return { purchaseId, proof: second }
    }
  }

  return { proof: last }
}
