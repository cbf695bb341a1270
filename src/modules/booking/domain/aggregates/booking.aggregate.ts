import { AggregateRoot } from '../../../../shared/domain/base/aggregate-root.base';
import { InvalidTransitionError } from '../../../../shared/domain/errors/domain.errors';
import { BookingRequestedEvent } from '../events/booking-requested.event';
import { BookingStatusChangedEvent } from '../events/booking-status-changed.event';
import { BookingTransitionPolicy } from '../policies/booking-transition.policy';
import { AccessCode } from '../value-objects/access-code.vo';
import { BookingPricing } from '../value-objects/booking-pricing.vo';
import { BookingStatus, BookingType } from '../value-objects/booking-status';
import { BookingTiming } from '../value-objects/booking-timing.vo';

export type BookingResource =
    | { readonly type: 'private'; readonly listingId: string; readonly slotId: string }
    | { readonly type: 'commercial'; readonly facilityId: string };

export interface BookingMessages {
    readonly driverMessage: string | null;
    readonly hostMessage: string | null;
}

export interface VehicleDetails {
    readonly vehicleNumber: string | null;
    readonly vehicleType: string | null;
}

export interface BookingProps {
    resource: BookingResource;
    driverId: string;
    hostId: string;
    status: BookingStatus;
    timing: BookingTiming;
    pricing: BookingPricing;
    accessCode: AccessCode;
    approvalTime: Date | null;
    rejectionReason: string | null;
    messages: BookingMessages;
    vehicle: VehicleDetails | null;
}

/** Values a transition may have written besides the status itself. */
export interface BookingTransitionFields {
    approvalTime?: Date;
    rejectionReason?: string;
    hostMessage?: string;
    actualStart?: Date;
    actualEnd?: Date;
    actualCost?: number;
}

/**
 * Booking Aggregate Root
 * One driver's claim on a private slot or on a unit of facility capacity.
 * Status changes go through the lifecycle table; the resource writes that
 * accompany them are coordinated outside the aggregate.
 */
export class Booking extends AggregateRoot<BookingProps> {
    private constructor(id: string, props: BookingProps) {
        super(id, props);
    }

    get type(): BookingType { return this.props.resource.type; }
    get resource(): BookingResource { return this.props.resource; }
    get driverId(): string { return this.props.driverId; }
    get hostId(): string { return this.props.hostId; }
    get status(): BookingStatus { return this.props.status; }
    get timing(): BookingTiming { return this.props.timing; }
    get pricing(): BookingPricing { return this.props.pricing; }
    get accessCode(): AccessCode { return this.props.accessCode; }
    get approvalTime(): Date | null { return this.props.approvalTime; }
    get rejectionReason(): string | null { return this.props.rejectionReason; }
    get messages(): BookingMessages { return this.props.messages; }
    get vehicle(): VehicleDetails | null { return this.props.vehicle; }

    get isTerminal(): boolean {
        return BookingTransitionPolicy.isTerminal(this.props.status);
    }

    get holdsResource(): boolean {
        return BookingTransitionPolicy.holdsResource(this.type, this.props.status);
    }

    static requestPrivate(params: {
        id: string;
        driverId: string;
        hostId: string;
        listingId: string;
        slotId: string;
        scheduledStart: Date;
        scheduledEnd: Date;
        agreedRate: number;
        estimatedCost: number;
        taxRate: number;
        driverMessage?: string;
        autoAccept: boolean;
        now: Date;
    }): Booking {
        const booking = new Booking(params.id, {
            resource: { type: 'private', listingId: params.listingId, slotId: params.slotId },
            driverId: params.driverId,
            hostId: params.hostId,
            status: params.autoAccept ? 'confirmed' : 'requested',
            timing: BookingTiming.schedule({
                requestedAt: params.now,
                scheduledStart: params.scheduledStart,
                scheduledEnd: params.scheduledEnd,
            }),
            pricing: BookingPricing.forPrivate({
                agreedRate: params.agreedRate,
                estimatedCost: params.estimatedCost,
                taxRate: params.taxRate,
            }),
            accessCode: AccessCode.generate(),
            approvalTime: params.autoAccept ? params.now : null,
            rejectionReason: null,
            messages: { driverMessage: params.driverMessage ?? null, hostMessage: null },
            vehicle: null,
        });

        booking.addDomainEvent(new BookingRequestedEvent(
            booking.id, 'private', booking.driverId, booking.hostId, booking.status,
        ));
        return booking;
    }

    static bookCommercial(params: {
        id: string;
        driverId: string;
        hostId: string;
        facilityId: string;
        scheduledStart: Date;
        scheduledEnd: Date;
        hourlyRate: number;
        estimatedDuration: number;
        estimatedCost: number;
        vehicle?: VehicleDetails;
        now: Date;
    }): Booking {
        const booking = new Booking(params.id, {
            resource: { type: 'commercial', facilityId: params.facilityId },
            driverId: params.driverId,
            hostId: params.hostId,
            status: 'confirmed',
            timing: BookingTiming.schedule({
                requestedAt: params.now,
                scheduledStart: params.scheduledStart,
                scheduledEnd: params.scheduledEnd,
            }),
            pricing: BookingPricing.forCommercial({
                hourlyRate: params.hourlyRate,
                estimatedDuration: params.estimatedDuration,
                estimatedCost: params.estimatedCost,
            }),
            accessCode: AccessCode.generate(),
            approvalTime: null,
            rejectionReason: null,
            messages: { driverMessage: null, hostMessage: null },
            vehicle: params.vehicle ?? null,
        });

        booking.addDomainEvent(new BookingRequestedEvent(
            booking.id, 'commercial', booking.driverId, booking.hostId, booking.status,
        ));
        return booking;
    }

    static reconstitute(id: string, props: BookingProps): Booking {
        return new Booking(id, props);
    }

    approve(at: Date, hostMessage?: string): void {
        this.transitionTo('confirmed');
        this.props.approvalTime = at;
        this.setHostMessage(hostMessage);
    }

    reject(reason: string, hostMessage?: string): void {
        this.transitionTo('rejected');
        this.props.rejectionReason = reason;
        this.setHostMessage(hostMessage);
    }

    /**
     * Driver-initiated cancellation. Private bookings end immediately; a
     * commercial one waits for the owner to confirm and keeps its capacity
     * until then.
     */
    requestCancellation(): BookingStatus {
        this.transitionTo(this.type === 'private' ? 'cancelled' : 'cancel_requested');
        return this.props.status;
    }

    confirmCancellation(): void {
        this.transitionTo('cancelled');
    }

    start(at: Date): void {
        this.transitionTo('active');
        this.props.timing = this.props.timing.withActualStart(at);
    }

    /** Without an override the estimate becomes the final charge. */
    complete(at: Date, actualCost?: number): void {
        this.transitionTo('completed');
        this.props.timing = this.props.timing.withActualEnd(at);
        this.props.pricing = this.props.pricing.withActualCost(actualCost ?? this.props.pricing.estimatedCost);
    }

    markNoShow(): void {
        this.transitionTo('no_show');
    }

    transitionFields(): BookingTransitionFields {
        const fields: BookingTransitionFields = {};
        if (this.props.approvalTime) fields.approvalTime = this.props.approvalTime;
        if (this.props.rejectionReason !== null) fields.rejectionReason = this.props.rejectionReason;
        if (this.props.messages.hostMessage !== null) fields.hostMessage = this.props.messages.hostMessage;
        if (this.props.timing.actualStart) fields.actualStart = this.props.timing.actualStart;
        if (this.props.timing.actualEnd) fields.actualEnd = this.props.timing.actualEnd;
        if (this.props.pricing.actualCost !== null) fields.actualCost = this.props.pricing.actualCost;
        return fields;
    }

    private setHostMessage(hostMessage?: string): void {
        if (hostMessage !== undefined) {
            this.props.messages = { ...this.props.messages, hostMessage };
        }
    }

    private transitionTo(next: BookingStatus): void {
        const from = this.props.status;
        if (!BookingTransitionPolicy.canTransition(this.type, from, next)) {
            throw new InvalidTransitionError(this.id, from, next);
        }

        this.props.status = next;
        this.addDomainEvent(new BookingStatusChangedEvent(
            this.id, this.type, this.props.driverId, this.props.hostId, from, next,
        ));
    }
}
