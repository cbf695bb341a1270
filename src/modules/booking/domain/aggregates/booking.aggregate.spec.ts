import { InvalidTransitionError } from '../../../../shared/domain/errors/domain.errors';
import { BookingStatusChangedEvent } from '../events/booking-status-changed.event';
import { Booking } from './booking.aggregate';

const NOW = new Date('2030-03-01T08:00:00.000Z');
const START = new Date('2030-03-01T09:00:00.000Z');
const END = new Date('2030-03-01T12:00:00.000Z');

function privateBooking(autoAccept = false): Booking {
    return Booking.requestPrivate({
        id: 'booking-1',
        driverId: 'driver-1',
        hostId: 'host-1',
        listingId: 'listing-1',
        slotId: 'A',
        scheduledStart: START,
        scheduledEnd: END,
        agreedRate: 12,
        estimatedCost: 1000,
        taxRate: 0.18,
        driverMessage: 'Arriving early',
        autoAccept,
        now: NOW,
    });
}

function commercialBooking(): Booking {
    return Booking.bookCommercial({
        id: 'booking-2',
        driverId: 'driver-1',
        hostId: 'owner-1',
        facilityId: 'facility-1',
        scheduledStart: START,
        scheduledEnd: END,
        hourlyRate: 4,
        estimatedDuration: 3,
        estimatedCost: 12,
        now: NOW,
    });
}

describe('Booking', () => {
    describe('requestPrivate', () => {
        it('starts as requested and holds nothing', () => {
            const booking = privateBooking();

            expect(booking.status).toBe('requested');
            expect(booking.holdsResource).toBe(false);
            expect(booking.approvalTime).toBeNull();
            expect(booking.pricing.taxAmount).toBe(180);
            expect(booking.messages).toEqual({ driverMessage: 'Arriving early', hostMessage: null });
            expect(booking.domainEvents.map(event => event.eventName)).toEqual(['booking.requested']);
        });

        it('is confirmed and stamped when the listing auto-accepts', () => {
            const booking = privateBooking(true);

            expect(booking.status).toBe('confirmed');
            expect(booking.approvalTime).toEqual(NOW);
            expect(booking.holdsResource).toBe(true);
        });

        it('gets a six-digit access code', () => {
            expect(privateBooking().accessCode.value).toMatch(/^\d{6}$/);
        });
    });

    describe('bookCommercial', () => {
        it('is confirmed straight away with duration pricing', () => {
            const booking = commercialBooking();

            expect(booking.status).toBe('confirmed');
            expect(booking.type).toBe('commercial');
            expect(booking.pricing.estimatedDuration).toBe(3);
            expect(booking.pricing.taxAmount).toBeNull();
            expect(booking.vehicle).toBeNull();
        });
    });

    describe('transitions', () => {
        it('records the approval and the host message', () => {
            const booking = privateBooking();
            booking.clearDomainEvents();
            const at = new Date('2030-03-01T08:10:00.000Z');

            booking.approve(at, 'Use the side gate');

            expect(booking.status).toBe('confirmed');
            expect(booking.transitionFields()).toEqual({ approvalTime: at, hostMessage: 'Use the side gate' });
            const [event] = booking.domainEvents;
            expect(event).toBeInstanceOf(BookingStatusChangedEvent);
            expect(event.eventName).toBe('booking.confirmed');
            expect(event.toPayload()).toMatchObject({ bookingId: 'booking-1', from: 'requested', to: 'confirmed' });
        });

        it('cancels a private booking directly', () => {
            const booking = privateBooking(true);

            expect(booking.requestCancellation()).toBe('cancelled');
            expect(booking.isTerminal).toBe(true);
        });

        it('routes a commercial cancellation through the owner', () => {
            const booking = commercialBooking();

            expect(booking.requestCancellation()).toBe('cancel_requested');
            expect(booking.holdsResource).toBe(true);

            booking.confirmCancellation();
            expect(booking.status).toBe('cancelled');
            expect(booking.holdsResource).toBe(false);
        });

        it('charges the estimate when no final cost is given', () => {
            const booking = commercialBooking();
            const startedAt = new Date('2030-03-01T09:02:00.000Z');
            const endedAt = new Date('2030-03-01T11:40:00.000Z');

            booking.start(startedAt);
            booking.complete(endedAt);

            expect(booking.pricing.actualCost).toBe(12);
            expect(booking.transitionFields()).toEqual({ actualStart: startedAt, actualEnd: endedAt, actualCost: 12 });
        });

        it('keeps a final cost override', () => {
            const booking = privateBooking(true);
            booking.start(START);

            booking.complete(END, 950);

            expect(booking.pricing.actualCost).toBe(950);
        });

        it.each([
            ['reject a confirmed booking', (booking: Booking) => booking.reject('Too late')],
            ['complete a confirmed booking', (booking: Booking) => booking.complete(END)],
            ['approve a booking twice', (booking: Booking) => booking.approve(NOW)],
        ] as const)('refuses to %s', (_label, move) => {
            const booking = privateBooking(true);

            expect(() => move(booking)).toThrow(InvalidTransitionError);
            expect(booking.status).toBe('confirmed');
        });

        it('never leaves a terminal status', () => {
            const booking = privateBooking();
            booking.reject('No space');

            expect(() => booking.approve(NOW)).toThrow(new InvalidTransitionError('booking-1', 'rejected', 'confirmed'));
            expect(() => booking.requestCancellation()).toThrow(InvalidTransitionError);
            expect(() => booking.markNoShow()).toThrow(InvalidTransitionError);
            expect(booking.status).toBe('rejected');
        });

        it('does not let a commercial booking be rejected', () => {
            expect(() => commercialBooking().reject('No')).toThrow(
                new InvalidTransitionError('booking-2', 'confirmed', 'rejected'),
            );
        });
    });
});
