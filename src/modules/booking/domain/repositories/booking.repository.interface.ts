import { Booking, BookingTransitionFields } from '../aggregates/booking.aggregate';
import { BookingStatus } from '../value-objects/booking-status';

export const BOOKING_REPOSITORY = Symbol('BOOKING_REPOSITORY');

/**
 * The booking ledger. Rows are never deleted. Lists are ordered by
 * `requestedAt`, newest first.
 */
export interface IBookingRepository {
    /** Inserts the booking and stamps `requestedAt` with the store's clock. */
    create(booking: Booking): Promise<string>;
    findById(id: string): Promise<Booking | null>;
    /** Throws NotFoundError. */
    get(id: string): Promise<Booking>;
    /**
     * Moves the booking from `expected` to `next` and writes `fields`, only if
     * it is still in `expected`. Throws StaleTransitionError otherwise. The
     * legality of the edge is not checked here.
     */
    updateStatus(
        id: string,
        expected: BookingStatus,
        next: BookingStatus,
        fields?: BookingTransitionFields,
    ): Promise<void>;

    findByDriver(driverId: string): Promise<Booking[]>;
    findByHost(hostId: string): Promise<Booking[]>;
    findPendingApprovals(hostId: string): Promise<Booking[]>;
    findActiveByDriver(driverId: string): Promise<Booking[]>;

    /** Bookings that currently hold a slot or a unit of capacity. */
    findHolding(): Promise<Booking[]>;
    /** Commercial bookings on the facility that currently hold a unit of capacity. */
    countHoldingByFacility(facilityId: string): Promise<number>;
    /** Confirmed bookings scheduled to start before `cutoff`, oldest first. */
    findOverdueConfirmed(cutoff: Date, limit: number): Promise<Booking[]>;
}
