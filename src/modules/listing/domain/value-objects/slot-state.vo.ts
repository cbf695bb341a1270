import { ValueObject } from '../../../../shared/domain/base/value-object.base';

interface SlotStateProps {
    readonly occupied: boolean;
    readonly bookingId: string | null;
    readonly expectedEndTime: Date | null;
}

/**
 * Occupancy of one private-listing slot. A slot references a booking exactly
 * while that booking has it reserved or occupied.
 */
export class SlotState extends ValueObject<SlotStateProps> {
    private constructor(props: SlotStateProps) {
        super(props);
    }

    get occupied(): boolean {
        return this.props.occupied;
    }

    get bookingId(): string | null {
        return this.props.bookingId;
    }

    get expectedEndTime(): Date | null {
        return this.props.expectedEndTime;
    }

    get isFree(): boolean {
        return this.props.bookingId === null;
    }

    static create(props: SlotStateProps): SlotState {
        if (props.bookingId === null && (props.occupied || props.expectedEndTime !== null)) {
            throw new Error('A slot without a booking cannot be occupied or have an end time');
        }
        return new SlotState(props);
    }

    static free(): SlotState {
        return new SlotState({ occupied: false, bookingId: null, expectedEndTime: null });
    }

    static reservedFor(bookingId: string, expectedEndTime: Date): SlotState {
        return new SlotState({ occupied: false, bookingId, expectedEndTime });
    }

    static occupiedBy(bookingId: string, expectedEndTime: Date): SlotState {
        return new SlotState({ occupied: true, bookingId, expectedEndTime });
    }

    isHeldBy(bookingId: string): boolean {
        return this.props.bookingId === bookingId;
    }

    /**
     * Whether a write of `next` may replace this state when the writer believes
     * `expectedHolder` holds the slot. A held slot only changes hands through
     * its own booking.
     */
    acceptsWrite(next: SlotState, expectedHolder: string | null): boolean {
        const holder = this.props.bookingId;
        return holder === null || holder === expectedHolder || holder === next.bookingId;
    }

    protected equalsCore(other: SlotState): boolean {
        return this.props.occupied === other.props.occupied &&
            this.props.bookingId === other.props.bookingId &&
            this.props.expectedEndTime?.getTime() === other.props.expectedEndTime?.getTime();
    }
}
