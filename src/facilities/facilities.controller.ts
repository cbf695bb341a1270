import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
} from '@nestjs/common';
import { CurrentUser } from '../common/decorators/current-user.decorator';
import { ThrottleManagement } from '../common/decorators/throttle.decorator';
import type { AuthenticatedUser } from '../common/interfaces/authenticated-user.interface';
import { CreateFacilityDto } from './dto/create-facility.dto';
import { type FacilityView, toFacilityView } from './dto/facility-view.dto';
import { UpdateCapacityDto, UpdateFacilityActiveDto } from './dto/update-facility.dto';
import { FacilitiesService } from './facilities.service';

@Controller('api/v1/facilities')
export class FacilitiesController {
  constructor(private readonly facilitiesService: FacilitiesService) { }

  @Post()
  @ThrottleManagement()
  @HttpCode(HttpStatus.CREATED)
  async create(
    @Body() dto: CreateFacilityDto,
    @CurrentUser() user: AuthenticatedUser | undefined,
  ): Promise<FacilityView> {
    return toFacilityView(await this.facilitiesService.createFacility(user?.id, dto));
  }

  @Get('mine')
  async listMine(@CurrentUser() user: AuthenticatedUser | undefined): Promise<FacilityView[]> {
    const facilities = await this.facilitiesService.listOwnFacilities(user?.id);
    return facilities.map(toFacilityView);
  }

  @Get(':id')
  async get(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: AuthenticatedUser | undefined,
  ): Promise<FacilityView> {
    return toFacilityView(await this.facilitiesService.getFacility(user?.id, id));
  }

  @Patch(':id/capacity')
  @ThrottleManagement()
  async setCapacity(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateCapacityDto,
    @CurrentUser() user: AuthenticatedUser | undefined,
  ): Promise<{ total: number; available: number }> {
    const capacity = await this.facilitiesService.setTotalCapacity(user?.id, id, dto.totalCapacity);
    return { total: capacity.total, available: capacity.available };
  }

  @Patch(':id/active')
  @ThrottleManagement()
  async setActive(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateFacilityActiveDto,
    @CurrentUser() user: AuthenticatedUser | undefined,
  ): Promise<FacilityView> {
    return toFacilityView(await this.facilitiesService.setActive(user?.id, id, dto.isActive));
  }

  @Delete(':id')
  @ThrottleManagement()
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: AuthenticatedUser | undefined,
  ): Promise<void> {
    await this.facilitiesService.deleteFacility(user?.id, id);
  }
}
