import { Invoice } from '../domain/models';
import { UpdateInvoiceSettlementDto } from '../interfaces';

/**
 * Apply a signed payment delta to an invoice.
 * amountPaid never drops below zero; paidAt is set once the subtotal is
 * covered (an existing timestamp is kept) and cleared when it no longer is.
 */
export function settleInvoice(
  invoice: Invoice,
  delta: number,
  at: Date,
): UpdateInvoiceSettlementDto {
  const amountPaid = Math.max(0, invoice.amountPaid + delta);
  const covered = invoice.subtotal > 0 && amountPaid >= invoice.subtotal;

  return {
    amountPaid,
    paidAt: covered ? (invoice.paidAt ?? at) : null,
  };
}
