import { Lot } from '../src/core/types';
import { orderLotsForSale, selectLotsForSale } from '../src/ledger/lotSelection';

const lot = (lotId: string, acquisitionDate: string, quantity: number, costPerShare: number): Lot => ({
  lotId,
  symbol: 'SPY',
  quantity,
  costBasis: quantity * costPerShare,
  acquisitionDate,
  isWashSale: false,
  washSaleDisallowed: 0
});

const lots = [lot('a', '2024-01-02', 10, 400), lot('b', '2024-02-01', 10, 450), lot('c', '2024-03-01', 10, 350)];
const ids = (ordered: Lot[]) => ordered.map((l) => l.lotId);

describe('orderLotsForSale', () => {
  it('orders by acquisition date for FIFO and LIFO', () => {
    expect(ids(orderLotsForSale(lots, 'FIFO', 'TAXABLE'))).toEqual(['a', 'b', 'c']);
    expect(ids(orderLotsForSale(lots, 'LIFO', 'TAXABLE'))).toEqual(['c', 'b', 'a']);
  });

  it('orders by cost per share for HIFO in a taxable account', () => {
    expect(ids(orderLotsForSale(lots, 'HIFO', 'TAXABLE'))).toEqual(['b', 'a', 'c']);
  });

  it('falls back to FIFO for HIFO in tax-advantaged accounts', () => {
    expect(ids(orderLotsForSale(lots, 'HIFO', 'ROTH_IRA'))).toEqual(['a', 'b', 'c']);
    expect(ids(orderLotsForSale(lots, 'HIFO', 'TRADITIONAL_IRA'))).toEqual(['a', 'b', 'c']);
  });

  it('keeps purchase order for equal cost', () => {
    const tied = [lot('x', '2024-01-02', 5, 100), lot('y', '2024-01-03', 5, 100)];
    expect(ids(orderLotsForSale(tied, 'HIFO', 'TAXABLE'))).toEqual(['x', 'y']);
  });

  it('does not reorder the input array', () => {
    orderLotsForSale(lots, 'LIFO', 'TAXABLE');
    expect(ids(lots)).toEqual(['a', 'b', 'c']);
  });
});

describe('selectLotsForSale', () => {
  it('takes whole lots then a partial one', () => {
    const slices = selectLotsForSale(lots, 15, 'HIFO', 'TAXABLE');
    expect(slices.map((s) => [s.lot.lotId, s.quantity])).toEqual([
      ['b', 10],
      ['a', 5]
    ]);
  });

  it('only touches the first HIFO lot when the sale fits in it', () => {
    const slices = selectLotsForSale(lots, 7, 'HIFO', 'TAXABLE');
    expect(slices).toHaveLength(1);
    expect(slices[0].lot.lotId).toBe('b');
    expect(slices[0].quantity).toBe(7);
  });
});
