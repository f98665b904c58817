import { AccountType, Lot, LotMethod } from '../core/types';

export interface LotSlice {
  lot: Lot;
  quantity: number;
}

const byAcquisition = (a: Lot, b: Lot) => a.acquisitionDate.localeCompare(b.acquisitionDate);
const costPerShare = (lot: Lot) => (lot.quantity > 0 ? lot.costBasis / lot.quantity : 0);

/**
 * Order in which lots are consumed by a sale. HIFO only pays off where gains are taxed,
 * so tax-advantaged accounts fall back to FIFO. Sorts are stable: ties keep purchase order.
 */
export const orderLotsForSale = (lots: readonly Lot[], method: LotMethod, accountType: AccountType): Lot[] => {
  const ordered = lots.slice();
  switch (method) {
    case 'LIFO':
      return ordered.sort((a, b) => byAcquisition(b, a));
    case 'HIFO':
      if (accountType === 'TAXABLE') {
        return ordered.sort((a, b) => costPerShare(b) - costPerShare(a));
      }
      return ordered.sort(byAcquisition);
    case 'FIFO':
    default:
      return ordered.sort(byAcquisition);
  }
};

export const selectLotsForSale = (
  lots: readonly Lot[],
  quantity: number,
  method: LotMethod,
  accountType: AccountType
): LotSlice[] => {
  const selected: LotSlice[] = [];
  let remaining = quantity;
  for (const lot of orderLotsForSale(lots, method, accountType)) {
    if (remaining <= 0) break;
    const fromLot = Math.min(lot.quantity, remaining);
    selected.push({ lot, quantity: fromLot });
    remaining -= fromLot;
  }
  return selected;
};
