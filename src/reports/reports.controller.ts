import { Body, Controller, DefaultValuePipe, Get, HttpCode, HttpStatus, ParseIntPipe, Post, Query, UseGuards } from '@nestjs/common';
import { ApiKeyGuard } from '../common/guards/shared-secret.guard';
import { ReportsService } from './reports.service';
import { DailyReportQueryDto, RangeReportQueryDto, RunDailyReportDto } from './dto/report-query.dto';

@Controller('api/reports')
@UseGuards(ApiKeyGuard)
export class ReportsController {
  constructor(private reportsService: ReportsService) {}

  @Get('daily')
  daily(@Query() query: DailyReportQueryDto) {
    return this.reportsService.aggregateDay(query.date, query.timezone || this.reportsService.timezone);
  }

  @Get('range')
  range(@Query() query: RangeReportQueryDto) {
    return this.reportsService.aggregateRange(query.start, query.end);
  }

  @Get('history')
  history(@Query('limit', new DefaultValuePipe(30), ParseIntPipe) limit: number) {
    return this.reportsService.listStoredReports(Math.min(Math.max(limit, 1), 365));
  }

  @Post('daily')
  @HttpCode(HttpStatus.OK)
  run(@Body() body: RunDailyReportDto) {
    return this.reportsService.generateDailyReport(body.date, body.timezone || this.reportsService.timezone);
  }
}
