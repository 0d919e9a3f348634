export enum LedgerDirection {
  DEBIT = 'debit',
  CREDIT = 'credit',
}

/**
 * What caused a ledger entry. Part of the entry's idempotency key
 */
export enum LedgerSourceType {
  BILLING_CYCLE = 'billing_cycle',
  ADJUSTMENT = 'adjustment',
  PAYMENT = 'payment',
  PAYMENT_FEE = 'payment_fee',
  CREDIT_GRANT = 'credit_grant',
  CREDIT_USE = 'credit_use',
  REFUND = 'refund',
  DISPUTE_HOLD = 'dispute_hold',
  DISPUTE_LOSS = 'dispute_loss',
  DISPUTE_WIN = 'dispute_win',
}

/**
 * Chart-of-accounts codes. Accounts are created lazily per tenant
 */
export enum LedgerAccountCode {
  ACCOUNTS_RECEIVABLE = 'accounts_receivable',
  CASH = 'cash',
  REVENUE_USAGE = 'revenue_usage',
  REVENUE_FLAT = 'revenue_flat',
  TAX_PAYABLE = 'tax_payable',
  CREDIT_BALANCE = 'credit_balance',
  REFUND_LIABILITY = 'refund_liability',
  PAYMENT_FEE_EXPENSE = 'payment_fee_expense',
  ADJUSTMENT = 'adjustment',
}
