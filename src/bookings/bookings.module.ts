import { Module } from '@nestjs/common';
import { CommonModule } from '../common/common.module';
import { BookingDddModule } from '../modules/booking/booking-ddd.module';
import { BookingChangeListener } from '../modules/booking/infrastructure/notifications/booking-change.listener';
import { FacilityDddModule } from '../modules/facility/facility-ddd.module';
import { ListingDddModule } from '../modules/listing/listing-ddd.module';
import { BookingFeedService } from './booking-feed.service';
import { BookingsController } from './bookings.controller';
import { BookingsService } from './bookings.service';
import { ParkingMaintenanceService } from './parking-maintenance.service';
import { ReconciliationService } from './reconciliation.service';

@Module({
  imports: [CommonModule, BookingDddModule, FacilityDddModule, ListingDddModule],
  controllers: [BookingsController],
  providers: [BookingsService, BookingFeedService, ReconciliationService, ParkingMaintenanceService, BookingChangeListener],
  exports: [BookingsService, ReconciliationService, ParkingMaintenanceService],
})
export class BookingsModule { }
