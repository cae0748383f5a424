export interface PaymentLink {
  // Opaque token the provider issued for this link
  reference: string
  url: string
}

export type VerificationMode = 'gateway' | 'auto-accept'

