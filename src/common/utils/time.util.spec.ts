import { InvalidReportRequestError } from '../errors';
import { previousZonedDay, toInstant, zoneOffsetMs, zonedDayLabel, zonedDayWindow } from './time.util';

describe('time.util', () => {
  describe('toInstant', () => {
    it('should accept a Date and an ISO string with an offset', () => {
      const date = new Date('2024-03-10T12:00:00Z');

      expect(toInstant(date)).toBe(date);
      expect(toInstant('2024-03-10T14:00:00+02:00')).toEqual(date);
    });

    it('should refuse values that need a guessed zone', () => {
      expect(toInstant('2024-03-10T12:00:00')).toBeNull();
      expect(toInstant('2024-03-10')).toBeNull();
      expect(toInstant(1710072000000)).toBeNull();
      expect(toInstant(new Date('nope'))).toBeNull();
    });
  });

  describe('zoneOffsetMs', () => {
    it('should follow daylight saving time', () => {
      expect(zoneOffsetMs('America/New_York', new Date('2024-01-15T12:00:00Z'))).toBe(-5 * 3600000);
      expect(zoneOffsetMs('America/New_York', new Date('2024-07-15T12:00:00Z'))).toBe(-4 * 3600000);
    });
  });

  describe('zonedDayWindow', () => {
    it('should cover a UTC day', () => {
      expect(zonedDayWindow('2024-03-10', 'UTC')).toEqual({
        start: new Date('2024-03-10T00:00:00Z'),
        end: new Date('2024-03-11T00:00:00Z'),
      });
    });

    it('should start at local midnight east of UTC', () => {
      expect(zonedDayWindow('2024-03-10', 'Asia/Tokyo')).toEqual({
        start: new Date('2024-03-09T15:00:00Z'),
        end: new Date('2024-03-10T15:00:00Z'),
      });
    });

    it('should span 25 hours on a fall-back day', () => {
      const window = zonedDayWindow('2024-11-03', 'America/New_York');

      expect(window.start).toEqual(new Date('2024-11-03T04:00:00Z'));
      expect(window.end).toEqual(new Date('2024-11-04T05:00:00Z'));
    });

    it('should reject a malformed label', () => {
      expect(() => zonedDayWindow('10/03/2024', 'UTC')).toThrow('Day label must be YYYY-MM-DD, got "10/03/2024"');
    });

    it('should reject a day that does not exist', () => {
      expect(() => zonedDayWindow('2024-02-30', 'UTC')).toThrow(InvalidReportRequestError);
    });

    it('should reject an unknown timezone', () => {
      expect(() => zonedDayWindow('2024-03-10', 'Not/AZone')).toThrow('Unknown timezone "Not/AZone"');
    });
  });

  describe('zonedDayLabel', () => {
    it('should name the local calendar day', () => {
      expect(zonedDayLabel(new Date('2024-03-10T15:30:00Z'), 'Asia/Tokyo')).toBe('2024-03-11');
      expect(zonedDayLabel(new Date('2024-03-10T15:30:00Z'), 'UTC')).toBe('2024-03-10');
    });
  });

  describe('previousZonedDay', () => {
    it('should return the local day before now', () => {
      // 23:00 on 10 March in New York
      expect(previousZonedDay(new Date('2024-03-11T03:00:00Z'), 'America/New_York')).toBe('2024-03-09');
    });
  });
});
