import { Module } from '@nestjs/common';
import { CommonModule } from '../common/common.module';
import { IdentityDddModule } from '../modules/identity/identity-ddd.module';
import { UsersService } from './users.service';
import { UsersController } from './users.controller';

@Module({
  imports: [CommonModule, IdentityDddModule],
  providers: [UsersService],
  exports: [UsersService],
  controllers: [UsersController],
})
export class UsersModule {}
