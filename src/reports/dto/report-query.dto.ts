import { IsOptional, IsString, Matches } from 'class-validator';

export class DailyReportQueryDto {
  @IsString()
  @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: 'date must be YYYY-MM-DD' })
  date!: string;

  @IsOptional()
  @IsString()
  timezone?: string; // IANA name; defaults to TIMEZONE
}

export class RangeReportQueryDto {
  @IsString()
  start!: string;

  @IsString()
  end!: string;
}

export class RunDailyReportDto {
  @IsOptional()
  @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: 'date must be YYYY-MM-DD' })
  date?: string;

  @IsOptional()
  @IsString()
  timezone?: string;
}
