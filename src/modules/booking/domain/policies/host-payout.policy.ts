import { roundCurrency } from '../../../../common/utils/currency';

/**
 * Domain Policy: Host Payout
 * Earnings and tax derived from a booking's estimated cost.
 */
export class HostPayoutPolicy {
    static readonly DEFAULT_PAYOUT_RATE = 0.85;
    static readonly DEFAULT_TAX_RATE = 0.18;

    /**
     * Amount credited to a private host when a session ends. Based on the
     * estimate even when the final charge differs.
     */
    static calculateHostEarnings(estimatedCost: number, payoutRate: number = this.DEFAULT_PAYOUT_RATE): number {
        return roundCurrency(estimatedCost * payoutRate);
    }

    static calculateTax(estimatedCost: number, taxRate: number = this.DEFAULT_TAX_RATE): number {
        return roundCurrency(estimatedCost * taxRate);
    }
}
