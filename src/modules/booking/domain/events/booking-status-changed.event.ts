import { DomainEvent } from '../../../../shared/domain/base/domain-event.base';
import { BookingStatus, BookingType } from '../value-objects/booking-status';

/** Named after the status reached, e.g. `booking.confirmed`. */
export class BookingStatusChangedEvent extends DomainEvent {
    constructor(
        public readonly bookingId: string,
        public readonly bookingType: BookingType,
        public readonly driverId: string,
        public readonly hostId: string,
        public readonly from: BookingStatus,
        public readonly to: BookingStatus,
    ) {
        super(`booking.${to}`);
    }

    toPayload(): Record<string, unknown> {
        return {
            bookingId: this.bookingId,
            bookingType: this.bookingType,
            driverId: this.driverId,
            hostId: this.hostId,
            from: this.from,
            to: this.to,
            changedOn: this.occurredOn,
        };
    }
}
