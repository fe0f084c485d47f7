import { IsArray, IsBoolean, IsOptional, IsString } from 'class-validator';

export class UpdateSettingsDto {
  @IsBoolean()
  @IsOptional()
  signalsPaused?: boolean;

  @IsArray()
  @IsString({ each: true })
  @IsOptional()
  ignoredPairs?: string[]; // Any spelling the normalizer accepts, e.g. 'BTCUSDT'
}
