/**
 * Domain Policy: Booking Request
 * Sanity checks on what a driver submits before anything is reserved.
 */
export class BookingRequestPolicy {
    static validateSchedule(params: {
        scheduledStart: Date;
        scheduledEnd: Date;
    }): { valid: boolean; error?: string } {
        const start = params.scheduledStart.getTime();
        const end = params.scheduledEnd.getTime();

        if (Number.isNaN(start) || Number.isNaN(end)) {
            return { valid: false, error: 'Scheduled start and end must be valid dates' };
        }
        if (start >= end) {
            return { valid: false, error: 'Scheduled start must be before scheduled end' };
        }

        return { valid: true };
    }

    static validateAmounts(amounts: Record<string, number>): { valid: boolean; error?: string } {
        for (const [name, amount] of Object.entries(amounts)) {
            if (!Number.isFinite(amount) || amount < 0) {
                return { valid: false, error: `${name} must be a non-negative number` };
            }
        }

        return { valid: true };
    }
}
