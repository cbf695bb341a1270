import { Entity } from '../../../../shared/domain/base/entity.base';
import { FacilityCapacity } from '../value-objects/facility-capacity.vo';

export interface CommercialFacilityProps {
    ownerId: string;
    name: string;
    address: string;
    latitude: number | null;
    longitude: number | null;
    facilityType: string;
    defaultHourlyRate: number;
    flatDayRate: number | null;
    capacity: FacilityCapacity;
    isActive: boolean;
    isDeleted: boolean;
    createdAt: Date;
}

export class CommercialFacility extends Entity<CommercialFacilityProps> {
    private constructor(id: string, props: CommercialFacilityProps) {
        super(id, props);
    }

    get ownerId(): string { return this.props.ownerId; }
    get name(): string { return this.props.name; }
    get address(): string { return this.props.address; }
    get latitude(): number | null { return this.props.latitude; }
    get longitude(): number | null { return this.props.longitude; }
    get facilityType(): string { return this.props.facilityType; }
    get defaultHourlyRate(): number { return this.props.defaultHourlyRate; }
    get flatDayRate(): number | null { return this.props.flatDayRate; }
    get capacity(): FacilityCapacity { return this.props.capacity; }
    get isActive(): boolean { return this.props.isActive; }
    get isDeleted(): boolean { return this.props.isDeleted; }
    get createdAt(): Date { return this.props.createdAt; }

    /** Deleted facilities stay deleted; inactive ones can be switched back on. */
    get acceptsBookings(): boolean {
        return this.props.isActive && !this.props.isDeleted;
    }

    static create(params: {
        id: string;
        ownerId: string;
        name: string;
        address: string;
        latitude?: number;
        longitude?: number;
        facilityType: string;
        defaultHourlyRate: number;
        flatDayRate?: number;
        totalCapacity: number;
    }): CommercialFacility {
        if (params.defaultHourlyRate < 0) {
            throw new Error('Hourly rate cannot be negative');
        }

        return new CommercialFacility(params.id, {
            ownerId: params.ownerId,
            name: params.name,
            address: params.address,
            latitude: params.latitude ?? null,
            longitude: params.longitude ?? null,
            facilityType: params.facilityType,
            defaultHourlyRate: params.defaultHourlyRate,
            flatDayRate: params.flatDayRate ?? null,
            capacity: FacilityCapacity.create(params.totalCapacity),
            isActive: true,
            isDeleted: false,
            createdAt: new Date(),
        });
    }

    static reconstitute(id: string, props: CommercialFacilityProps): CommercialFacility {
        return new CommercialFacility(id, props);
    }
}
