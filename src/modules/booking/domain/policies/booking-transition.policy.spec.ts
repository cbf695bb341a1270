import { BOOKING_STATUSES } from '../value-objects/booking-status';
import { BookingTransitionPolicy } from './booking-transition.policy';
import { HostPayoutPolicy } from './host-payout.policy';
import { NoShowPolicy } from './no-show.policy';

describe('BookingTransitionPolicy', () => {
    it.each([
        ['private', 'requested', 'confirmed'],
        ['private', 'requested', 'rejected'],
        ['private', 'requested', 'cancelled'],
        ['private', 'confirmed', 'active'],
        ['private', 'confirmed', 'no_show'],
        ['private', 'active', 'completed'],
        ['private', 'active', 'cancelled'],
        ['commercial', 'confirmed', 'cancel_requested'],
        ['commercial', 'active', 'cancel_requested'],
        ['commercial', 'cancel_requested', 'cancelled'],
    ] as const)('allows %s %s -> %s', (type, from, to) => {
        expect(BookingTransitionPolicy.canTransition(type, from, to)).toBe(true);
    });

    it.each([
        ['private', 'confirmed', 'cancel_requested'],
        ['private', 'requested', 'active'],
        ['commercial', 'confirmed', 'cancelled'],
        ['commercial', 'active', 'cancelled'],
        ['commercial', 'confirmed', 'rejected'],
    ] as const)('forbids %s %s -> %s', (type, from, to) => {
        expect(BookingTransitionPolicy.canTransition(type, from, to)).toBe(false);
    });

    it('has no way out of a terminal status', () => {
        const terminal = BOOKING_STATUSES.filter(status => BookingTransitionPolicy.isTerminal(status));

        expect(terminal).toEqual(['cancelled', 'completed', 'rejected', 'no_show']);
        for (const from of terminal) {
            for (const to of BOOKING_STATUSES) {
                expect(BookingTransitionPolicy.canTransition('private', from, to)).toBe(false);
                expect(BookingTransitionPolicy.canTransition('commercial', from, to)).toBe(false);
            }
        }
    });

    it('knows which statuses hold a resource', () => {
        expect(BookingTransitionPolicy.holdingStatuses('private')).toEqual(['confirmed', 'active']);
        expect(BookingTransitionPolicy.holdingStatuses('commercial')).toEqual(['confirmed', 'active', 'cancel_requested']);
        expect(BookingTransitionPolicy.holdsResource('private', 'requested')).toBe(false);
    });
});

describe('HostPayoutPolicy', () => {
    it('credits 85% of the estimate, rounded to cents', () => {
        expect(HostPayoutPolicy.calculateHostEarnings(1000)).toBe(850);
        expect(HostPayoutPolicy.calculateHostEarnings(500)).toBe(425);
        expect(HostPayoutPolicy.calculateHostEarnings(19.99)).toBe(16.99);
    });

    it('taxes 18% of the estimate', () => {
        expect(HostPayoutPolicy.calculateTax(1000)).toBe(180);
        expect(HostPayoutPolicy.calculateTax(12.5)).toBe(2.25);
    });
});

describe('NoShowPolicy', () => {
    const scheduledStart = new Date('2030-05-01T10:00:00.000Z');

    it('waits out the grace period', () => {
        expect(NoShowPolicy.canMarkNoShow({
            scheduledStart,
            now: new Date('2030-05-01T10:29:59.000Z'),
        })).toEqual({ allowed: false, reason: 'A no-show can be recorded 30 minutes after the scheduled start' });

        expect(NoShowPolicy.canMarkNoShow({
            scheduledStart,
            now: new Date('2030-05-01T10:30:00.000Z'),
        })).toEqual({ allowed: true });
    });

    it('computes the overdue cutoff', () => {
        expect(NoShowPolicy.overdueCutoff(new Date('2030-05-01T10:00:00.000Z'), 15))
            .toEqual(new Date('2030-05-01T09:45:00.000Z'));
    });
});
