import crypto from 'crypto'

export interface Authorization {
  approved: boolean
  message: string
}

export interface WorkflowRecord {
  userId: string
  name: string
  steps: string[]
  status: 'success' | 'failed'
  createdAt: string
}

/**
 * The record-keeping system as the engine sees it: opaque tokens in,
 * authorization verdicts out. Card data never crosses this boundary.
 */
export interface PaymentRecords {
  /** Latest stored token for the user, or null when nothing is vaulted. */
  fetchStoredPaymentToken(userId: string): Promise<string | null>
  authorize(token: string, amount: number): Promise<Authorization>
  recordWorkflow(userId: string, entry: Omit<WorkflowRecord, 'userId' | 'createdAt'>): Promise<void>
}

interface VaultEntry {
  userId: string
  token: string
  last4: string
}

/** In-process records with a fixed authorization ceiling. */
export class MemoryPaymentRecords implements PaymentRecords {
  private vault: VaultEntry[] = []
  private ledger: WorkflowRecord[] = []

  constructor(private readonly ceiling = 200) {}

  /** Vault a card number and hand back its token. */
  store(userId: string, cardNumber: string): string {
    const token = crypto.randomBytes(16).toString('base64url')
    this.vault.push({ userId, token, last4: cardNumber.replace(/\D/g, '').slice(-4) })
    return token
  }

  async fetchStoredPaymentToken(userId: string): Promise<string | null> {
    for (let i = this.vault.length - 1; i >= 0; i--) {
      if (this.vault[i].userId === userId) return this.vault[i].token
    }
    return null
  }

  async authorize(token: string, amount: number): Promise<Authorization> {
    if (amount > this.ceiling) return { approved: false, message: `Amount exceeds $${this.ceiling} limit.` }
    const entry = this.vault.find((v) => v.token === token)
    if (!entry) return { approved: false, message: 'Invalid token.' }
    return {
      approved: true,
      message: `Approved $${amount} using vaulted token ending with ${entry.last4}.`,
    }
  }

  async recordWorkflow(userId: string, entry: Omit<WorkflowRecord, 'userId' | 'createdAt'>): Promise<void> {
    this.ledger.push({ ...entry, userId, createdAt: new Date().toISOString() })
  }

  workflows(userId?: string): WorkflowRecord[] {
    return this.ledger.filter((w) => userId === undefined || w.userId === userId)
  }
}
