import { createParkingTestingModule, type ParkingTestContext } from '../../test/support/parking-testing-module';
import { BookingsService } from './bookings.service';
import { ParkingMaintenanceService } from './parking-maintenance.service';
import { ReconciliationService } from './reconciliation.service';

describe('ParkingMaintenanceService', () => {
  let ctx: ParkingTestContext;
  let service: ParkingMaintenanceService;

  beforeEach(async () => {
    ctx = await createParkingTestingModule([ParkingMaintenanceService, BookingsService, ReconciliationService]);
    service = ctx.module.get(ParkingMaintenanceService);

    ctx.store.seedListing({ id: 'listing-1', hostId: 'host-1', slotIds: ['A'] });
    ctx.store.forceSlot('listing-1', 'A', {
      occupied: false,
      booking_id: 'ghost',
      expected_end_time: new Date('2030-01-02T11:00:00.000Z'),
    });
    ctx.store.forceListingFlag('listing-1', true);
  });

  it('repairs drift and reports each finding once', async () => {
    const result = await service.runOnce();

    expect(result.noShows).toEqual({ markedNoShow: 0, skipped: 0 });
    expect(result.reconciliation.inconsistencies.map(finding => finding.resourceId)).toEqual(['listing-1/A']);
    expect(ctx.store.slot('listing-1', 'A').booking_id).toBeNull();
    expect(ctx.logger.logError).toHaveBeenCalledTimes(1);
    expect(ctx.logger.logBusinessEvent.mock.calls).toEqual([
      ['reconciliation_completed', { inconsistencies: 1, repaired: 1 }],
    ]);
  });
});
