/**
 * Domain Policy: No-Show
 * A confirmed booking whose session never started may be closed once the
 * grace period after its scheduled start has passed.
 */
export class NoShowPolicy {
    static readonly DEFAULT_GRACE_MINUTES = 30;

    static canMarkNoShow(params: {
        scheduledStart: Date;
        now: Date;
        graceMinutes?: number;
    }): { allowed: boolean; reason?: string } {
        const grace = params.graceMinutes ?? this.DEFAULT_GRACE_MINUTES;
        const allowedFrom = params.scheduledStart.getTime() + grace * 60_000;

        if (params.now.getTime() < allowedFrom) {
            return {
                allowed: false,
                reason: `A no-show can be recorded ${grace} minutes after the scheduled start`,
            };
        }

        return { allowed: true };
    }

    /** Bookings scheduled to start before this instant are overdue. */
    static overdueCutoff(now: Date, graceMinutes: number = this.DEFAULT_GRACE_MINUTES): Date {
        return new Date(now.getTime() - graceMinutes * 60_000);
    }
}
