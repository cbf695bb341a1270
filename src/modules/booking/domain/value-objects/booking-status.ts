export const BOOKING_TYPES = ['private', 'commercial'] as const;
export type BookingType = (typeof BOOKING_TYPES)[number];

export const BOOKING_STATUSES = [
    'requested',
    'confirmed',
    'active',
    'cancel_requested',
    'cancelled',
    'completed',
    'rejected',
    'no_show',
] as const;
export type BookingStatus = (typeof BOOKING_STATUSES)[number];

export function isBookingStatus(value: unknown): value is BookingStatus {
    return BOOKING_STATUSES.some(status => status === value);
}

export function isBookingType(value: unknown): value is BookingType {
    return BOOKING_TYPES.some(type => type === value);
}
