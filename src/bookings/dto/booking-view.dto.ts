import type { Booking } from '../../modules/booking/domain/aggregates/booking.aggregate';
import type { BookingStatus, BookingType } from '../../modules/booking/domain/value-objects/booking-status';

export interface BookingView {
  id: string;
  type: BookingType;
  status: BookingStatus;
  driverId: string;
  hostId: string;
  listingId: string | null;
  slotId: string | null;
  facilityId: string | null;
  timing: {
    requestedAt: string;
    scheduledStart: string;
    scheduledEnd: string;
    actualStart: string | null;
    actualEnd: string | null;
  };
  pricing: {
    rate: number;
    estimatedCost: number;
    actualCost: number | null;
    taxAmount: number | null;
    estimatedDuration: number | null;
  };
  /** Only shown to the driver. */
  accessCode?: string;
  approvalTime: string | null;
  rejectionReason: string | null;
  messages: {
    driverMessage: string | null;
    hostMessage: string | null;
  };
  vehicle: {
    vehicleNumber: string | null;
    vehicleType: string | null;
  } | null;
}

const iso = (date: Date | null): string | null => (date ? date.toISOString() : null);

/**
 * API shape of a booking as seen by `viewerId`. The gate code is left out for
 * everyone but the driver.
 */
export function toBookingView(booking: Booking, viewerId: string | undefined): BookingView {
  const resource = booking.resource;

  const view: BookingView = {
    id: booking.id,
    type: booking.type,
    status: booking.status,
    driverId: booking.driverId,
    hostId: booking.hostId,
    listingId: resource.type === 'private' ? resource.listingId : null,
    slotId: resource.type === 'private' ? resource.slotId : null,
    facilityId: resource.type === 'commercial' ? resource.facilityId : null,
    timing: {
      requestedAt: booking.timing.requestedAt.toISOString(),
      scheduledStart: booking.timing.scheduledStart.toISOString(),
      scheduledEnd: booking.timing.scheduledEnd.toISOString(),
      actualStart: iso(booking.timing.actualStart),
      actualEnd: iso(booking.timing.actualEnd),
    },
    pricing: {
      rate: booking.pricing.rate,
      estimatedCost: booking.pricing.estimatedCost,
      actualCost: booking.pricing.actualCost,
      taxAmount: booking.pricing.taxAmount,
      estimatedDuration: booking.pricing.estimatedDuration,
    },
    approvalTime: iso(booking.approvalTime),
    rejectionReason: booking.rejectionReason,
    messages: { ...booking.messages },
    vehicle: booking.vehicle ? { ...booking.vehicle } : null,
  };

  if (booking.driverId === viewerId) {
    view.accessCode = booking.accessCode.value;
  }
  return view;
}
