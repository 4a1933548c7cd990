import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  UseFilters,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { RecurrenceService } from '../recurrence.service';
import { ResolveScheduleDto } from '../dto/resolve-schedule.dto';
import { OccurrencesQueryDto } from '../dto/occurrences-query.dto';
import {
  OccurrencesResponseDto,
  ScheduleResponseDto,
} from '../dto/schedule-response.dto';
import { DateErrorFilter } from '../../filters/date-error.filter';

@ApiTags('recurrence')
@Controller('recurrence')
@UseFilters(DateErrorFilter)
export class RecurrenceController {
  constructor(private readonly recurrenceService: RecurrenceService) {}

  @ApiOperation({
    summary: 'Parse a repetition schedule',
    description:
      'Parses a free-text schedule and ending phrase against a start date and returns the parsed repetition with its next and final occurrence',
  })
  @ApiResponse({
    status: 200,
    description: 'The parsed schedule',
    type: ScheduleResponseDto,
  })
  @ApiResponse({ status: 400, description: 'Unrecognised schedule or date' })
  @ApiResponse({ status: 422, description: 'Invalid request body' })
  @Post('schedule')
  @HttpCode(HttpStatus.OK)
  resolveSchedule(@Body() body: ResolveScheduleDto): ScheduleResponseDto {
    return new ScheduleResponseDto(
      this.recurrenceService.resolveSchedule(body),
    );
  }

  @ApiOperation({
    summary: 'List the occurrences of a repetition schedule',
    description:
      'Returns the start date followed by each occurrence until the schedule ends or the requested count is reached',
  })
  @ApiResponse({
    status: 200,
    description: 'Occurrence dates (YYYY-MM-DD)',
    type: OccurrencesResponseDto,
  })
  @ApiResponse({ status: 400, description: 'Unrecognised schedule or date' })
  @ApiResponse({ status: 422, description: 'Invalid request body' })
  @Post('occurrences')
  @HttpCode(HttpStatus.OK)
  listOccurrences(@Body() body: OccurrencesQueryDto): OccurrencesResponseDto {
    return new OccurrencesResponseDto(
      this.recurrenceService.resolveOccurrences(body, body.count),
    );
  }
}
