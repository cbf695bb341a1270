import { BookingStatus, BookingType } from '../value-objects/booking-status';

type TransitionTable = Readonly<Record<BookingStatus, readonly BookingStatus[]>>;

const TERMINAL: readonly BookingStatus[] = ['cancelled', 'completed', 'rejected', 'no_show'];

/**
 * Domain Policy: Booking Lifecycle
 * Legal status edges for each booking model.
 */
export class BookingTransitionPolicy {
    private static readonly TRANSITIONS: Readonly<Record<BookingType, TransitionTable>> = {
        private: {
            requested: ['confirmed', 'rejected', 'cancelled'],
            confirmed: ['active', 'cancelled', 'no_show'],
            active: ['completed', 'cancelled'],
            cancel_requested: [],
            cancelled: [],
            completed: [],
            rejected: [],
            no_show: [],
        },
        commercial: {
            requested: [],
            confirmed: ['active', 'cancel_requested', 'no_show'],
            active: ['completed', 'cancel_requested'],
            cancel_requested: ['cancelled'],
            cancelled: [],
            completed: [],
            rejected: [],
            no_show: [],
        },
    };

    private static readonly HOLDING: Readonly<Record<BookingType, readonly BookingStatus[]>> = {
        private: ['confirmed', 'active'],
        commercial: ['confirmed', 'active', 'cancel_requested'],
    };

    static canTransition(type: BookingType, from: BookingStatus, to: BookingStatus): boolean {
        return this.TRANSITIONS[type][from].includes(to);
    }

    static isTerminal(status: BookingStatus): boolean {
        return TERMINAL.includes(status);
    }

    /**
     * Whether a booking in this status keeps its slot (private) or one unit of
     * facility capacity (commercial).
     */
    static holdsResource(type: BookingType, status: BookingStatus): boolean {
        return this.HOLDING[type].includes(status);
    }

    static holdingStatuses(type: BookingType): readonly BookingStatus[] {
        return this.HOLDING[type];
    }
}
