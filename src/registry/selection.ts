/**
 * Wallet selection by index
 *
 * An explicit index set, when non-empty, wins over the range; a null range
 * (configured as [0, 0]) selects everything.
 */

import { WalletSelection } from '../config';

export function isSelected(id: number, selection: WalletSelection): boolean {
  if (selection.exact.length > 0) {
    return selection.exact.includes(id);
  }
  if (selection.range) {
    const [start, end] = selection.range;
    return id >= start && id <= end;
  }
  return true;
}

export function describeSelection(selection: WalletSelection): string {
  if (selection.exact.length > 0) {
    return `exact [${selection.exact.join(', ')}]`;
  }
  if (selection.range) {
    return `range ${selection.range[0]}..${selection.range[1]}`;
  }
  return 'all wallets';
}
