/**
 * Settlement view of an invoice. Invoices are issued elsewhere; the pipeline
 * only moves amountPaid and paidAt.
 */
export interface Invoice {
  id: string;
  tenantId: string;
  customerId: string;
  currency: string;
  subtotal: number;
  amountPaid: number;
  paidAt: Date | null;
}
