import { Module } from '@nestjs/common';
import { DatabaseModule } from '../../database/database.module';
import { LISTING_REPOSITORY } from './domain/repositories/listing.repository.interface';
import { ListingRepository } from './infrastructure/persistence/listing.repository';

@Module({
    imports: [DatabaseModule],
    providers: [
        {
            provide: LISTING_REPOSITORY,
            useClass: ListingRepository,
        },
    ],
    exports: [LISTING_REPOSITORY],
})
export class ListingDddModule { }
