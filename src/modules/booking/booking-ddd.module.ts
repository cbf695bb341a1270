import { Module } from '@nestjs/common';
import { DatabaseModule } from '../../database/database.module';
import { BOOKING_REPOSITORY } from './domain/repositories/booking.repository.interface';
import { PARKING_UNIT_OF_WORK } from './domain/repositories/parking-unit-of-work.interface';
import { BookingRepository } from './infrastructure/persistence/booking.repository';
import { PgParkingUnitOfWork } from './infrastructure/persistence/pg-parking-unit-of-work';

@Module({
    imports: [DatabaseModule],
    providers: [
        {
            provide: BOOKING_REPOSITORY,
            useClass: BookingRepository,
        },
        {
            provide: PARKING_UNIT_OF_WORK,
            useClass: PgParkingUnitOfWork,
        },
    ],
    exports: [BOOKING_REPOSITORY, PARKING_UNIT_OF_WORK],
})
export class BookingDddModule { }
