import { Controller, Put, Body, Get, UseGuards } from '@nestjs/common';
import { ApiKeyGuard } from '../common/guards/shared-secret.guard';
import { SettingsService } from './settings.service';
import { RealtimeService } from '../realtime/realtime.service';
import { UpdateSettingsDto } from './dto/update-settings.dto';

@Controller('api/settings')
@UseGuards(ApiKeyGuard)
export class SettingsController {
  constructor(
    private settingsService: SettingsService,
    private realtimeService: RealtimeService,
  ) {}

  @Get()
  async getSettings() {
    return await this.settingsService.getRuntimeSettings();
  }

  @Put()
  async updateSettings(@Body() updates: UpdateSettingsDto) {
    const updated = await this.settingsService.updateSettings(updates);
    const settings = await this.settingsService.getRuntimeSettings();

    this.realtimeService.broadcast('settings-update', {
      settings,
      updatedKeys: updated.map((s) => s.key),
    });

    return {
      message: 'Settings updated successfully',
      updated: updated.length,
      settings,
    };
  }
}
