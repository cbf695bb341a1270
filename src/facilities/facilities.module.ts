import { Module } from '@nestjs/common';
import { CommonModule } from '../common/common.module';
import { BookingDddModule } from '../modules/booking/booking-ddd.module';
import { FacilityDddModule } from '../modules/facility/facility-ddd.module';
import { FacilitiesController } from './facilities.controller';
import { FacilitiesService } from './facilities.service';

@Module({
  imports: [CommonModule, BookingDddModule, FacilityDddModule],
  controllers: [FacilitiesController],
  providers: [FacilitiesService],
  exports: [FacilitiesService],
})
export class FacilitiesModule { }
