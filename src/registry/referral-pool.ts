/**
 * Referral code assignment
 *
 * Codes come from the configured invite_codes list, drawn with replacement so
 * a short list can serve any number of wallets. When the list is empty the
 * pool falls back to invite codes the portal reported for other wallets.
 * A wallet keeps the first code it is given.
 */

import { WalletRecord } from '../types';
import { createLogger } from '../utils/logger';
import { RandomSource, mathRandom, pick } from '../utils/random';
import { WalletRegistry } from './wallet-registry';

const log = createLogger('referral');

export class ReferralPool {
  private readonly codes: readonly string[];

  constructor(
    codes: readonly string[],
    private readonly random: RandomSource = mathRandom
  ) {
    this.codes = codes.map((code) => code.trim()).filter((code) => code.length > 0);
  }

  get configured(): number {
    return this.codes.length;
  }

  /**
   * Draw a code. `ownCode` is never returned, so a wallet cannot refer itself.
   */
  draw(ownCode: string | null, fallback: readonly string[] = []): string | null {
    const primary = this.codes.filter((code) => code !== ownCode);
    const candidates = primary.length > 0 ? primary : fallback.filter((code) => code !== ownCode);
    return pick(this.random, candidates) ?? null;
  }

  /**
   * Return the wallet's referral code, assigning and persisting one first if
   * it has none. Null when no code is available anywhere.
   */
  ensureAssigned(registry: WalletRegistry, wallet: Pick<WalletRecord, 'id'>): string | null {
    const record = registry.get(wallet.id);
    if (record.referralCode) {
      return record.referralCode;
    }

    const code = this.draw(record.inviteCode, registry.harvestedInviteCodes(record.id));
    if (!code) {
      log.debug('No referral code available', { wallet: record.id });
      return null;
    }

    registry.assignReferralCode(record.id, code);
    log.debug('Referral code assigned', { wallet: record.id });
    return code;
  }
}
