export type DomainErrorCode =
    | 'NOT_AUTHENTICATED'
    | 'NOT_FOUND'
    | 'NO_CAPACITY'
    | 'INVALID_DATA'
    | 'PARTIAL_FAILURE'
    | 'STALE_TRANSITION'
    | 'INVALID_TRANSITION'
    | 'SLOT_UNAVAILABLE'
    | 'NOT_PERMITTED'
    | 'INVALID_REQUEST';

export type DomainEntityName = 'Booking' | 'Facility' | 'Listing' | 'Slot' | 'User';

/**
 * Base for every failure the parking core reports. The `code` is stable and is
 * what clients and the HTTP filter branch on; the message is for humans.
 */
export abstract class DomainError extends Error {
    abstract readonly code: DomainErrorCode;

    protected constructor(
        message: string,
        readonly details: Record<string, unknown> = {},
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class NotAuthenticatedError extends DomainError {
    readonly code = 'NOT_AUTHENTICATED';

    constructor() {
        super('An authenticated user is required');
    }
}

export class NotFoundError extends DomainError {
    readonly code = 'NOT_FOUND';

    constructor(entity: DomainEntityName, id: string) {
        super(`${entity} ${id} not found`, { entity, id });
    }
}

/** The facility is fully booked. Callers must not retry the reservation. */
export class NoCapacityError extends DomainError {
    readonly code = 'NO_CAPACITY';

    constructor(facilityId: string) {
        super('Facility is fully booked', { facilityId });
    }
}

/** A persisted record failed validation while being read back. */
export class InvalidDataError extends DomainError {
    readonly code = 'INVALID_DATA';

    constructor(record: string, problems: string[], id?: string) {
        super(`Malformed ${record} record${id ? ` ${id}` : ''}: ${problems.join('; ')}`, { record, id, problems });
    }
}

/**
 * Part of a multi-step write may have been applied. Reconciliation has to
 * inspect the affected resources before they can be trusted again.
 */
export class PartialFailureError extends DomainError {
    readonly code = 'PARTIAL_FAILURE';

    constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
        super(message, details, cause === undefined ? undefined : { cause });
    }
}

export class StaleTransitionError extends DomainError {
    readonly code = 'STALE_TRANSITION';

    constructor(bookingId: string, expected: string, actual: string) {
        super(`Booking ${bookingId} is ${actual}, expected ${expected}`, { bookingId, expected, actual });
    }
}

export class InvalidTransitionError extends DomainError {
    readonly code = 'INVALID_TRANSITION';

    constructor(bookingId: string, from: string, to: string) {
        super(`Booking ${bookingId} cannot move from ${from} to ${to}`, { bookingId, from, to });
    }
}

export class SlotUnavailableError extends DomainError {
    readonly code = 'SLOT_UNAVAILABLE';

    constructor(listingId: string, slotId: string, heldBy: string | null) {
        super(`Slot ${slotId} of listing ${listingId} is held by another booking`, { listingId, slotId, heldBy });
    }
}

export class NotPermittedError extends DomainError {
    readonly code = 'NOT_PERMITTED';

    constructor(reason: string, details: Record<string, unknown> = {}) {
        super(reason, details);
    }
}

export class InvalidRequestError extends DomainError {
    readonly code = 'INVALID_REQUEST';

    constructor(reason: string, details: Record<string, unknown> = {}) {
        super(reason, details);
    }
}
