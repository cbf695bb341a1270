import { Injectable } from '@nestjs/common';
import { BookingsService, type NoShowSweepResult } from './bookings.service';
import { ReconciliationService, type ReconciliationReport } from './reconciliation.service';

export interface MaintenanceResult {
  noShows: NoShowSweepResult;
  reconciliation: ReconciliationReport;
}

/**
 * One upkeep pass: closes overdue confirmed bookings, then reconciles and
 * repairs. Both steps log their own outcome.
 */
@Injectable()
export class ParkingMaintenanceService {
  constructor(
    private readonly bookingsService: BookingsService,
    private readonly reconciliationService: ReconciliationService,
  ) { }

  async runOnce(now: Date = new Date()): Promise<MaintenanceResult> {
    const noShows = await this.bookingsService.sweepNoShows(now);
    const reconciliation = await this.reconciliationService.reconcile({ repair: true });
    return { noShows, reconciliation };
  }
}
