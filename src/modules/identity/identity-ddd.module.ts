import { Module } from '@nestjs/common';
import { DatabaseModule } from '../../database/database.module';
import { USER_PROFILE_REPOSITORY } from './domain/repositories/user-profile.repository.interface';
import { UserProfileRepository } from './infrastructure/persistence/user-profile.repository';

@Module({
    imports: [DatabaseModule],
    providers: [
        {
            provide: USER_PROFILE_REPOSITORY,
            useClass: UserProfileRepository,
        },
    ],
    exports: [USER_PROFILE_REPOSITORY],
})
export class IdentityDddModule { }
