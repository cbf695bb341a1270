import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  MessageEvent,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Sse,
} from '@nestjs/common';
import { Observable, map } from 'rxjs';
import { CurrentUser } from '../common/decorators/current-user.decorator';
import { ThrottleAccessCode, ThrottleBooking } from '../common/decorators/throttle.decorator';
import type { AuthenticatedUser } from '../common/interfaces/authenticated-user.interface';
import { BookingFeedService } from './booking-feed.service';
import { BookingsService } from './bookings.service';
import {
  ApproveBookingDto,
  EndSessionDto,
  RejectBookingDto,
  VerifyAccessCodeDto,
} from './dto/booking-actions.dto';
import { type BookingView, toBookingView } from './dto/booking-view.dto';
import { CreateCommercialBookingDto } from './dto/create-commercial-booking.dto';
import { CreatePrivateBookingDto } from './dto/create-private-booking.dto';

@Controller('api/v1/bookings')
export class BookingsController {
  constructor(
    private readonly bookingsService: BookingsService,
    private readonly bookingFeed: BookingFeedService,
  ) { }

  @Post('private')
  @ThrottleBooking()
  @HttpCode(HttpStatus.CREATED)
  async requestPrivate(
    @Body() dto: CreatePrivateBookingDto,
    @CurrentUser() user: AuthenticatedUser | undefined,
  ): Promise<BookingView> {
    const booking = await this.bookingsService.requestPrivateBooking(user?.id, dto);
    return toBookingView(booking, booking.driverId);
  }

  @Post('commercial')
  @ThrottleBooking()
  @HttpCode(HttpStatus.CREATED)
  async bookCommercial(
    @Body() dto: CreateCommercialBookingDto,
    @CurrentUser() user: AuthenticatedUser | undefined,
  ): Promise<BookingView> {
    const booking = await this.bookingsService.bookCommercialSpot(user?.id, dto);
    return toBookingView(booking, booking.driverId);
  }

  @Get('mine')
  async listMine(@CurrentUser() user: AuthenticatedUser | undefined): Promise<BookingView[]> {
    const bookings = await this.bookingsService.listDriverBookings(user?.id);
    return bookings.map(booking => toBookingView(booking, booking.driverId));
  }

  @Get('hosted')
  async listHosted(@CurrentUser() user: AuthenticatedUser | undefined): Promise<BookingView[]> {
    const bookings = await this.bookingsService.listHostBookings(user?.id);
    return bookings.map(booking => toBookingView(booking, booking.hostId));
  }

  @Get('pending-approvals')
  async listPendingApprovals(@CurrentUser() user: AuthenticatedUser | undefined): Promise<BookingView[]> {
    const bookings = await this.bookingsService.listPendingApprovals(user?.id);
    return bookings.map(booking => toBookingView(booking, booking.hostId));
  }

  @Get('active')
  async listActive(@CurrentUser() user: AuthenticatedUser | undefined): Promise<BookingView[]> {
    const bookings = await this.bookingsService.listActiveBookings(user?.id);
    return bookings.map(booking => toBookingView(booking, booking.driverId));
  }

  @Sse('mine/stream')
  streamMine(@CurrentUser() user: AuthenticatedUser | undefined): Observable<MessageEvent> {
    return this.bookingFeed.watchDriverBookings(user?.id).pipe(map(bookings => ({ data: bookings })));
  }

  @Sse('pending-approvals/stream')
  streamPendingApprovals(@CurrentUser() user: AuthenticatedUser | undefined): Observable<MessageEvent> {
    return this.bookingFeed.watchPendingApprovals(user?.id).pipe(map(bookings => ({ data: bookings })));
  }

  @Get(':id')
  async getBooking(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: AuthenticatedUser | undefined,
  ): Promise<BookingView> {
    const booking = await this.bookingsService.getBooking(user?.id, id);
    return toBookingView(booking, user?.id);
  }

  @Patch(':id/approve')
  @ThrottleBooking()
  async approve(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: ApproveBookingDto,
    @CurrentUser() user: AuthenticatedUser | undefined,
  ): Promise<BookingView> {
    const booking = await this.bookingsService.approveBooking(user?.id, id, dto.hostMessage);
    return toBookingView(booking, booking.hostId);
  }

  @Patch(':id/reject')
  @ThrottleBooking()
  async reject(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: RejectBookingDto,
    @CurrentUser() user: AuthenticatedUser | undefined,
  ): Promise<BookingView> {
    const booking = await this.bookingsService.rejectBooking(user?.id, id, dto.reason, dto.hostMessage);
    return toBookingView(booking, booking.hostId);
  }

  @Patch(':id/cancel')
  @ThrottleBooking()
  async cancel(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: AuthenticatedUser | undefined,
  ): Promise<BookingView> {
    const booking = await this.bookingsService.cancelBooking(user?.id, id);
    return toBookingView(booking, booking.driverId);
  }

  @Patch(':id/cancel/confirm')
  @ThrottleBooking()
  async confirmCancellation(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: AuthenticatedUser | undefined,
  ): Promise<BookingView> {
    const booking = await this.bookingsService.confirmCancellation(user?.id, id);
    return toBookingView(booking, booking.hostId);
  }

  @Patch(':id/start')
  @ThrottleBooking()
  async start(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: AuthenticatedUser | undefined,
  ): Promise<BookingView> {
    const booking = await this.bookingsService.startSession(user?.id, id);
    return toBookingView(booking, user?.id);
  }

  @Patch(':id/end')
  @ThrottleBooking()
  async end(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: EndSessionDto,
    @CurrentUser() user: AuthenticatedUser | undefined,
  ): Promise<BookingView> {
    const booking = await this.bookingsService.endSession(user?.id, id, dto.actualCost);
    return toBookingView(booking, user?.id);
  }

  @Patch(':id/no-show')
  @ThrottleBooking()
  async markNoShow(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: AuthenticatedUser | undefined,
  ): Promise<BookingView> {
    const booking = await this.bookingsService.markNoShow(user?.id, id);
    return toBookingView(booking, booking.hostId);
  }

  @Post(':id/verify-access')
  @ThrottleAccessCode()
  @HttpCode(HttpStatus.OK)
  async verifyAccess(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: VerifyAccessCodeDto,
    @CurrentUser() user: AuthenticatedUser | undefined,
  ): Promise<{ valid: boolean }> {
    const valid = await this.bookingsService.verifyAccessCode(user?.id, id, dto.code);
    return { valid };
  }
}
