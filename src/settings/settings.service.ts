import { Injectable, BadRequestException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ConfigService } from '@nestjs/config';
import { Setting } from '../entities/setting.entity';
import { LoggerService } from '../logger/logger.service';
import { DomainError } from '../common/errors';
import { displayPair, parsePair } from '../exchange/symbol-normalizer';
import { UpdateSettingsDto } from './dto/update-settings.dto';

export interface RuntimeSettings {
  signalsPaused: boolean;
  ignoredPairs: string[];
}

type SettingKey = 'SIGNALS_PAUSED' | 'IGNORED_PAIRS';

@Injectable()
export class SettingsService {
  private readonly defaultSettings: Record<SettingKey, { value: string; description: string }> = {
    SIGNALS_PAUSED: { value: 'false', description: 'Acknowledge webhook signals without recording them' },
    IGNORED_PAIRS: { value: '', description: 'Comma-separated canonical pairs whose signals are ignored' },
  };

  constructor(
    @InjectRepository(Setting)
    private settingRepository: Repository<Setting>,
    private configService: ConfigService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('SettingsService');
  }

  private isKnownKey(key: string): key is SettingKey {
    return Object.prototype.hasOwnProperty.call(this.defaultSettings, key);
  }

  /**
   * Get a setting value from database, falling back to env var, then default
   */
  async getSetting(key: string): Promise<string> {
    if (!this.isKnownKey(key)) {
      throw new BadRequestException(`Unknown setting key: ${key}`);
    }

    const dbSetting = await this.settingRepository.findOne({ where: { key } });
    if (dbSetting) {
      return dbSetting.value;
    }

    const envValue = this.configService.get<string>(key);
    if (envValue !== undefined && envValue !== '') {
      return envValue;
    }

    return this.defaultSettings[key].value;
  }

  async isPaused(): Promise<boolean> {
    return (await this.getSetting('SIGNALS_PAUSED')).trim().toLowerCase() === 'true';
  }

  /**
   * Ignored pairs in canonical `BASE/QUOTE` form. Unparseable entries are
   * logged and skipped.
   */
  async getIgnoredPairs(): Promise<Set<string>> {
    const raw = await this.getSetting('IGNORED_PAIRS');
    const pairs = new Set<string>();
    for (const entry of raw.split(',').map((s) => s.trim()).filter((s) => s)) {
      try {
        pairs.add(displayPair(parsePair(entry)));
      } catch (error: unknown) {
        if (!(error instanceof DomainError)) {
          throw error;
        }
        this.logger.warn('Skipping unparseable ignored pair', { entry });
      }
    }
    return pairs;
  }

  async getRuntimeSettings(): Promise<RuntimeSettings> {
    return {
      signalsPaused: await this.isPaused(),
      ignoredPairs: [...(await this.getIgnoredPairs())],
    };
  }

  async updateSetting(key: string, value: string, description?: string): Promise<Setting> {
    if (!this.isKnownKey(key)) {
      throw new BadRequestException(`Unknown setting key: ${key}`);
    }

    let setting = await this.settingRepository.findOne({ where: { key } });
    const oldValue = setting?.value;

    if (setting) {
      setting.value = value;
      if (description) {
        setting.description = description;
      }
    } else {
      setting = this.settingRepository.create({
        key,
        value,
        description: description || this.defaultSettings[key].description,
      });
    }

    const saved = await this.settingRepository.save(setting);

    this.logger.log(`Setting updated: ${key}`, {
      key,
      oldValue,
      newValue: value,
      changed: oldValue !== value,
    });

    return saved;
  }

  /**
   * Applies a partial update. Pairs are validated and canonicalised before
   * anything is written.
   */
  async updateSettings(updates: UpdateSettingsDto): Promise<Setting[]> {
    const writes: Array<[SettingKey, string]> = [];

    if (updates.signalsPaused !== undefined) {
      writes.push(['SIGNALS_PAUSED', String(updates.signalsPaused)]);
    }

    if (updates.ignoredPairs !== undefined) {
      const canonical = updates.ignoredPairs.map((entry) => {
        try {
          return displayPair(parsePair(entry));
        } catch (error: unknown) {
          if (error instanceof DomainError) {
            throw new BadRequestException(`Invalid pair in ignoredPairs: ${entry}`);
          }
          throw error;
        }
      });
      writes.push(['IGNORED_PAIRS', [...new Set(canonical)].join(',')]);
    }

    const results: Setting[] = [];
    for (const [key, value] of writes) {
      results.push(await this.updateSetting(key, value));
    }
    return results;
  }

  /**
   * Initialize default settings in database if they don't exist
   */
  async initializeDefaults(): Promise<void> {
    for (const [key, { value, description }] of Object.entries(this.defaultSettings)) {
      const existing = await this.settingRepository.findOne({ where: { key } });
      if (!existing) {
        await this.settingRepository.save({
          key,
          value: this.configService.get<string>(key) || value,
          description,
        });
        this.logger.debug(`Initialized default setting: ${key}`);
      }
    }
  }
}
