import { DomainEvent } from '../../../../shared/domain/base/domain-event.base';
import { BookingStatus, BookingType } from '../value-objects/booking-status';

export class BookingRequestedEvent extends DomainEvent {
    constructor(
        public readonly bookingId: string,
        public readonly bookingType: BookingType,
        public readonly driverId: string,
        public readonly hostId: string,
        public readonly status: BookingStatus,
    ) {
        super('booking.requested');
    }

    toPayload(): Record<string, unknown> {
        return {
            bookingId: this.bookingId,
            bookingType: this.bookingType,
            driverId: this.driverId,
            hostId: this.hostId,
            status: this.status,
            requestedOn: this.occurredOn,
        };
    }
}
