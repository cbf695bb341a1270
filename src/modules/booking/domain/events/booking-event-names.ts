import { BOOKING_STATUSES } from '../value-objects/booking-status';

/** Raised when another process changes a booking row (database notification). */
export const BOOKING_CHANGED_EVENT = 'booking.changed';

/** Every event after which a booking listing may look different. */
export const BOOKING_CHANGE_EVENTS: readonly string[] = [
    'booking.requested',
    ...BOOKING_STATUSES.filter(status => status !== 'requested').map(status => `booking.${status}`),
    BOOKING_CHANGED_EVENT,
];

/** The part of every booking event payload that says whose views are affected. */
export interface BookingChangePayload {
    bookingId: string;
    driverId: string;
    hostId: string;
}

export function isBookingChangePayload(value: unknown): value is BookingChangePayload {
    if (typeof value !== 'object' || value === null) return false;
    const fields: Record<string, unknown> = { ...value };
    return typeof fields.bookingId === 'string' &&
        typeof fields.driverId === 'string' &&
        typeof fields.hostId === 'string';
}
