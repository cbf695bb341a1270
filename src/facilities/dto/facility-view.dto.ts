import type { CommercialFacility } from '../../modules/facility/domain/entities/commercial-facility.entity';

export interface FacilityView {
  id: string;
  ownerId: string;
  name: string;
  address: string;
  latitude: number | null;
  longitude: number | null;
  facilityType: string;
  defaultHourlyRate: number;
  flatDayRate: number | null;
  capacity: {
    total: number;
    available: number;
  };
  isActive: boolean;
  createdAt: string;
}

export function toFacilityView(facility: CommercialFacility): FacilityView {
  return {
    id: facility.id,
    ownerId: facility.ownerId,
    name: facility.name,
    address: facility.address,
    latitude: facility.latitude,
    longitude: facility.longitude,
    facilityType: facility.facilityType,
    defaultHourlyRate: facility.defaultHourlyRate,
    flatDayRate: facility.flatDayRate,
    capacity: {
      total: facility.capacity.total,
      available: facility.capacity.available,
    },
    isActive: facility.isActive,
    createdAt: facility.createdAt.toISOString(),
  };
}
