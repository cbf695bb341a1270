import { NoCapacityError, PartialFailureError } from '../shared/domain/errors/domain.errors';
import { commercialBookingRow, privateBookingRow } from '../../test/support/booking-rows';
import type { InMemoryParkingStore } from '../../test/support/in-memory-parking-store';
import { createParkingTestingModule, type ParkingTestContext } from '../../test/support/parking-testing-module';
import { type BookCommercialSpotInput, BookingsService } from './bookings.service';
import { ReconciliationService } from './reconciliation.service';

const heldBy = (bookingId: string) => ({
  occupied: false,
  booking_id: bookingId,
  expected_end_time: new Date('2030-01-02T11:00:00.000Z'),
});

const spotAt = (facilityId: string): BookCommercialSpotInput => ({
  facilityId,
  scheduledStart: new Date(Date.now() + 3_600_000),
  scheduledEnd: new Date(Date.now() + 10_800_000),
  hourlyRate: 5,
  estimatedDuration: 2,
  estimatedCost: 10,
});

describe('ReconciliationService', () => {
  let ctx: ParkingTestContext;
  let store: InMemoryParkingStore;
  let service: ReconciliationService;
  let bookings: BookingsService;

  beforeEach(async () => {
    ctx = await createParkingTestingModule([ReconciliationService, BookingsService]);
    store = ctx.store;
    service = ctx.module.get(ReconciliationService);
    bookings = ctx.module.get(BookingsService);

    store.seedProfile('driver-1');
    store.seedProfile('driver-2');
    store.seedProfile('owner-1', { can_host_commercial: true });

    store.seedListing({ id: 'listing-1', hostId: 'host-1', slotIds: ['A', 'B'] });
    store.seedFacility({ id: 'facility-1', ownerId: 'owner-1', total: 3 });
  });

  it('finds nothing when counters, slots and flags agree with the ledger', async () => {
    store.seedBookingRow(privateBookingRow());
    store.forceSlot('listing-1', 'A', heldBy('booking-private'));
    store.forceListingFlag('listing-1', true);
    store.seedBookingRow(commercialBookingRow({ status: 'cancel_requested' }));
    store.forceFacilityAvailable('facility-1', 2);

    const report = await service.reconcile();

    expect(report.inconsistencies).toEqual([]);
    expect(report.checkedAt).toBeInstanceOf(Date);
    expect(ctx.logger.logBusinessEvent).toHaveBeenCalledWith('reconciliation_completed', {
      inconsistencies: 0,
      repaired: 0,
    });
  });

  it('corrects facility capacity to what the holding bookings imply', async () => {
    store.seedBookingRow(commercialBookingRow());
    store.seedBookingRow(commercialBookingRow({ id: 'booking-done', status: 'completed' }));

    const report = await service.reconcile();

    expect(report.inconsistencies).toEqual([{
      kind: 'facility_capacity_drift',
      resourceId: 'facility-1',
      detail: 'Facility facility-1 has 3 available, 1 holding bookings imply 2',
      repaired: true,
    }]);
    expect(store.facility('facility-1').capacity_available).toBe(2);
    expect(ctx.logger.logError).toHaveBeenCalledWith(expect.any(PartialFailureError), {
      kind: 'facility_capacity_drift',
      resourceId: 'facility-1',
      repaired: true,
    });
  });

  it('only reports when repair is off', async () => {
    store.seedBookingRow(commercialBookingRow());

    const report = await service.reconcile({ repair: false });

    expect(report.inconsistencies.map(finding => [finding.kind, finding.repaired])).toEqual([
      ['facility_capacity_drift', false],
    ]);
    expect(store.facility('facility-1').capacity_available).toBe(3);
  });

  it('frees a slot held by a booking that does not exist and refreshes the flag', async () => {
    store.forceSlot('listing-1', 'A', heldBy('ghost'));
    store.forceListingFlag('listing-1', true);

    const report = await service.reconcile();

    expect(report.inconsistencies).toEqual([{
      kind: 'orphaned_slot_hold',
      resourceId: 'listing-1/A',
      detail: 'Slot A of listing listing-1 is held but booking ghost does not exist',
      repaired: true,
    }]);
    expect(store.slot('listing-1', 'A').booking_id).toBeNull();
    expect(store.listing('listing-1').has_active_booking).toBe(false);
  });

  it('frees a slot still held by a finished booking', async () => {
    store.seedBookingRow(privateBookingRow({ status: 'completed' }));
    store.forceSlot('listing-1', 'A', heldBy('booking-private'));
    store.forceListingFlag('listing-1', true);

    const report = await service.reconcile();

    expect(report.inconsistencies.map(finding => finding.detail)).toEqual([
      'Slot A of listing listing-1 is held but booking booking-private is completed',
    ]);
    expect(store.slot('listing-1', 'A').booking_id).toBeNull();
  });

  it('resets a listing flag that disagrees with the slots', async () => {
    store.forceListingFlag('listing-1', true);

    const report = await service.reconcile();

    expect(report.inconsistencies).toEqual([{
      kind: 'listing_flag_drift',
      resourceId: 'listing-1',
      detail: 'Listing listing-1 flag is true but its slots say false',
      repaired: true,
    }]);
    expect(store.listing('listing-1').has_active_booking).toBe(false);
  });

  it('reports a holding booking whose slot is not held by it without touching anything', async () => {
    store.seedBookingRow(privateBookingRow({ status: 'active' }));

    const report = await service.reconcile();

    expect(report.inconsistencies).toEqual([{
      kind: 'missing_slot_hold',
      resourceId: 'booking-private',
      detail: 'Booking booking-private is active but slot A of listing listing-1 is not held by it',
      repaired: false,
    }]);
    expect(store.slot('listing-1', 'A').booking_id).toBeNull();
    expect(ctx.logger.logBusinessEvent).toHaveBeenCalledWith('reconciliation_completed', {
      inconsistencies: 1,
      repaired: 0,
    });
  });

  describe('while bookings keep changing', () => {
    it('counts a booking that commits after the facilities were listed', async () => {
      store.seedFacility({ id: 'facility-small', ownerId: 'owner-1', total: 1 });
      const facilities = store.repositories.facilities;
      const findAll = facilities.findAll.bind(facilities);
      jest.spyOn(facilities, 'findAll').mockImplementationOnce(async () => {
        const listed = await findAll();
        await bookings.bookCommercialSpot('driver-1', spotAt('facility-small'));
        return listed;
      });

      const report = await service.reconcile();

      expect(report.inconsistencies).toEqual([]);
      expect(store.facility('facility-small').capacity_available).toBe(0);
      await expect(bookings.bookCommercialSpot('driver-2', spotAt('facility-small')))
        .rejects.toThrow(new NoCapacityError('facility-small'));
    });

    it('leaves a booking made alongside the check untouched', async () => {
      store.seedFacility({ id: 'facility-small', ownerId: 'owner-1', total: 1 });

      const [report, booking] = await Promise.all([
        service.reconcile(),
        bookings.bookCommercialSpot('driver-1', spotAt('facility-small')),
      ]);

      expect(booking.status).toBe('confirmed');
      expect(report.inconsistencies).toEqual([]);
      expect(store.facility('facility-small').capacity_available).toBe(0);
    });

    it('does not report a booking cancelled after the holding bookings were listed', async () => {
      store.seedBookingRow(privateBookingRow());
      store.forceSlot('listing-1', 'A', heldBy('booking-private'));
      store.forceListingFlag('listing-1', true);
      const listings = store.repositories.listings;
      const findById = listings.findById.bind(listings);
      jest.spyOn(listings, 'findById').mockImplementationOnce(async listingId => {
        await bookings.cancelBooking('driver-1', 'booking-private');
        return findById(listingId);
      });

      const report = await service.reconcile();

      expect(report.inconsistencies).toEqual([]);
      expect(store.bookingRow('booking-private').status).toBe('cancelled');
      expect(store.slot('listing-1', 'A').booking_id).toBeNull();
      expect(ctx.logger.logError).not.toHaveBeenCalled();
    });

    it('keeps a hold whose booking turns out to own it on the locked re-read', async () => {
      store.seedBookingRow(privateBookingRow({ status: 'requested', approval_time: null }));
      store.forceSlot('listing-1', 'A', heldBy('booking-private'));
      store.forceListingFlag('listing-1', true);
      const ledger = store.repositories.bookings;
      const findById = ledger.findById.bind(ledger);
      jest.spyOn(ledger, 'findById').mockImplementationOnce(async id => {
        const suspect = await findById(id);
        store.seedBookingRow(privateBookingRow());
        return suspect;
      });

      const report = await service.reconcile();

      expect(report.inconsistencies).toEqual([]);
      expect(store.slot('listing-1', 'A').booking_id).toBe('booking-private');
      expect(store.listing('listing-1').has_active_booking).toBe(true);
    });
  });
});
