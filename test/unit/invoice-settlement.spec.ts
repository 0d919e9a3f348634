import { Invoice, settleInvoice } from '../../src';

describe('settleInvoice', () => {
  const at = new Date('2024-05-01T10:00:00Z');

  function invoice(overrides: Partial<Invoice> = {}): Invoice {
    return {
      id: 'inv_1',
      tenantId: 'tenant_a',
      customerId: 'cus_1',
      currency: 'USD',
      subtotal: 2000,
      amountPaid: 0,
      paidAt: null,
      ...overrides,
    };
  }

  it('should mark the invoice paid once the subtotal is covered', () => {
    expect(settleInvoice(invoice(), 2000, at)).toEqual({ amountPaid: 2000, paidAt: at });
  });

  it('should leave a partially paid invoice unpaid', () => {
    expect(settleInvoice(invoice(), 500, at)).toEqual({ amountPaid: 500, paidAt: null });
  });

  it('should keep the original paid time on overpayment', () => {
    const earlier = new Date('2024-04-01T00:00:00Z');

    expect(
      settleInvoice(invoice({ amountPaid: 2000, paidAt: earlier }), 100, at),
    ).toEqual({ amountPaid: 2100, paidAt: earlier });
  });

  it('should clear paidAt when a refund uncovers the invoice', () => {
    const paid = invoice({ amountPaid: 2000, paidAt: at });

    expect(settleInvoice(paid, -500, at)).toEqual({ amountPaid: 1500, paidAt: null });
  });

  it('should floor amountPaid at zero', () => {
    expect(settleInvoice(invoice({ amountPaid: 300 }), -500, at)).toEqual({
      amountPaid: 0,
      paidAt: null,
    });
  });

  it('should never mark a zero-subtotal invoice paid', () => {
    expect(settleInvoice(invoice({ subtotal: 0 }), 100, at)).toEqual({
      amountPaid: 100,
      paidAt: null,
    });
  });
});
