import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { getRepositoryToken } from '@nestjs/typeorm';
import { SettingsService } from './settings.service';
import { Setting } from '../entities/setting.entity';
import { LoggerService } from '../logger/logger.service';

describe('SettingsService', () => {
  let service: SettingsService;
  let stored: Map<string, string>;
  let env: Record<string, string>;
  let settingRepository: { findOne: jest.Mock; create: jest.Mock; save: jest.Mock };
  let logger: { setContext: jest.Mock; log: jest.Mock; warn: jest.Mock; debug: jest.Mock };

  beforeEach(async () => {
    stored = new Map();
    env = {};
    settingRepository = {
      findOne: jest.fn(({ where }: { where: { key: string } }) => {
        const value = stored.get(where.key);
        return Promise.resolve(value === undefined ? null : { key: where.key, value });
      }),
      create: jest.fn((fields: Partial<Setting>) => ({ ...fields })),
      save: jest.fn((setting: Setting) => {
        stored.set(setting.key, setting.value);
        return Promise.resolve(setting);
      }),
    };
    logger = { setContext: jest.fn(), log: jest.fn(), warn: jest.fn(), debug: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SettingsService,
        { provide: getRepositoryToken(Setting), useValue: settingRepository },
        { provide: ConfigService, useValue: { get: jest.fn((key: string) => env[key]) } },
        { provide: LoggerService, useValue: logger },
      ],
    }).compile();

    service = module.get(SettingsService);
  });

  it('should default to not paused with no ignored pairs', async () => {
    await expect(service.getRuntimeSettings()).resolves.toEqual({ signalsPaused: false, ignoredPairs: [] });
  });

  it('should fall back to the environment before the default', async () => {
    env.SIGNALS_PAUSED = 'true';

    await expect(service.isPaused()).resolves.toBe(true);
  });

  it('should prefer the stored value over the environment', async () => {
    env.SIGNALS_PAUSED = 'true';
    stored.set('SIGNALS_PAUSED', 'false');

    await expect(service.isPaused()).resolves.toBe(false);
  });

  it('should canonicalise ignored pairs and skip unparseable ones', async () => {
    stored.set('IGNORED_PAIRS', 'btcusdt, ETH-USDT,???');

    await expect(service.getIgnoredPairs()).resolves.toEqual(new Set(['BTC/USDT', 'ETH/USDT']));
    expect(logger.warn).toHaveBeenCalledWith('Skipping unparseable ignored pair', { entry: '???' });
  });

  it('should store canonical, de-duplicated pairs on update', async () => {
    const updated = await service.updateSettings({ signalsPaused: true, ignoredPairs: ['SOLUSDT', 'SOL/USDT', 'doge_usdt'] });

    expect(updated.map((s) => s.key)).toEqual(['SIGNALS_PAUSED', 'IGNORED_PAIRS']);
    expect(stored.get('SIGNALS_PAUSED')).toBe('true');
    expect(stored.get('IGNORED_PAIRS')).toBe('SOL/USDT,DOGE/USDT');
  });

  it('should reject an invalid pair without writing anything', async () => {
    await expect(service.updateSettings({ signalsPaused: true, ignoredPairs: ['NOTAPAIR'] })).rejects.toThrow(
      BadRequestException,
    );
    expect(settingRepository.save).not.toHaveBeenCalled();
  });

  it('should reject unknown keys', async () => {
    await expect(service.getSetting('UNIVERSE')).rejects.toThrow('Unknown setting key: UNIVERSE');
  });
});
