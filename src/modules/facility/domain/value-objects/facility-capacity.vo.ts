import { ValueObject } from '../../../../shared/domain/base/value-object.base';

interface FacilityCapacityProps {
    readonly total: number;
    readonly available: number;
}

/**
 * Spaces of a commercial facility. `available` counts spaces not held by a
 * confirmed, active or cancel-requested booking.
 */
export class FacilityCapacity extends ValueObject<FacilityCapacityProps> {
    private constructor(props: FacilityCapacityProps) {
        super(props);
    }

    get total(): number {
        return this.props.total;
    }

    get available(): number {
        return this.props.available;
    }

    get occupied(): number {
        return this.props.total - this.props.available;
    }

    get isFull(): boolean {
        return this.props.available <= 0;
    }

    static create(total: number, available: number = total): FacilityCapacity {
        if (!Number.isInteger(total) || total < 0) {
            throw new Error('Total capacity must be a non-negative integer');
        }
        if (!Number.isInteger(available) || available < 0) {
            throw new Error('Available capacity must be a non-negative integer');
        }
        if (available > total) {
            throw new Error('Available capacity cannot exceed total capacity');
        }

        return new FacilityCapacity({ total, available });
    }

    reserve(): FacilityCapacity {
        if (this.isFull) {
            throw new Error('No capacity left to reserve');
        }
        return new FacilityCapacity({ total: this.props.total, available: this.props.available - 1 });
    }

    /** Returns one space. Already at total is a no-op. */
    release(): FacilityCapacity {
        return new FacilityCapacity({
            total: this.props.total,
            available: Math.min(this.props.total, this.props.available + 1),
        });
    }

    /**
     * Keeps the occupied count and recomputes what is left. Shrinking below the
     * occupied count leaves nothing available rather than a negative number.
     */
    withTotal(newTotal: number): FacilityCapacity {
        return FacilityCapacity.create(newTotal, Math.max(0, newTotal - this.occupied));
    }

    withAvailable(available: number): FacilityCapacity {
        return FacilityCapacity.create(this.props.total, available);
    }

    protected equalsCore(other: FacilityCapacity): boolean {
        return this.props.total === other.props.total &&
            this.props.available === other.props.available;
    }
}
