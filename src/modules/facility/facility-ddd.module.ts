import { Module } from '@nestjs/common';
import { DatabaseModule } from '../../database/database.module';
import { FACILITY_REPOSITORY } from './domain/repositories/facility.repository.interface';
import { FacilityRepository } from './infrastructure/persistence/facility.repository';

@Module({
    imports: [DatabaseModule],
    providers: [
        {
            provide: FACILITY_REPOSITORY,
            useClass: FacilityRepository,
        },
    ],
    exports: [FACILITY_REPOSITORY],
})
export class FacilityDddModule { }
