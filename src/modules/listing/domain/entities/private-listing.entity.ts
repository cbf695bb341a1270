import { Entity } from '../../../../shared/domain/base/entity.base';
import { SlotState } from '../value-objects/slot-state.vo';

export interface ListingSlot {
    readonly slotId: string;
    readonly label: string;
    readonly state: SlotState;
}

export interface PrivateListingProps {
    hostId: string;
    title: string;
    autoAcceptBookings: boolean;
    isActive: boolean;
    hasActiveBooking: boolean;
    slots: ListingSlot[];
}

export class PrivateListing extends Entity<PrivateListingProps> {
    private constructor(id: string, props: PrivateListingProps) {
        super(id, props);
    }

    get hostId(): string { return this.props.hostId; }
    get title(): string { return this.props.title; }
    get autoAcceptBookings(): boolean { return this.props.autoAcceptBookings; }
    get isActive(): boolean { return this.props.isActive; }
    /** Denormalised flag as stored; may lag the slots until it is refreshed. */
    get hasActiveBooking(): boolean { return this.props.hasActiveBooking; }
    get slots(): readonly ListingSlot[] { return this.props.slots; }

    /** The flag value the slots actually imply. */
    get hasHeldSlot(): boolean {
        return this.props.slots.some(slot => !slot.state.isFree);
    }

    findSlot(slotId: string): ListingSlot | undefined {
        return this.props.slots.find(slot => slot.slotId === slotId);
    }

    static reconstitute(id: string, props: PrivateListingProps): PrivateListing {
        return new PrivateListing(id, props);
    }
}
