/**
 * Data Classification Tests
 */

import {
  SensitiveDataType,
  retentionDays,
  requiresEncryption,
  canShareWithThirdParty,
  isRetentionExpired,
  PRIVACY_RIGHTS,
  DATA_CATEGORIES,
} from '../src/index.js';

const DAY = 24 * 60 * 60 * 1000;

describe('data classification', () => {
  it('should give each category its retention period', () => {
    expect(retentionDays(SensitiveDataType.LOCATION)).toBe(90);
    expect(retentionDays(SensitiveDataType.BIOMETRIC)).toBe(365);
    expect(retentionDays(SensitiveDataType.PERSONAL_IDENTIFIABLE)).toBe(1095);
    expect(retentionDays(SensitiveDataType.EDUCATIONAL)).toBe(3650);
  });

  it('should require encryption for every category', () => {
    for (const type of Object.values(SensitiveDataType)) {
      expect(requiresEncryption(type)).toBe(true);
    }
  });

  it('should never share biometric or health data', () => {
    expect(canShareWithThirdParty(SensitiveDataType.BIOMETRIC)).toBe(false);
    expect(canShareWithThirdParty(SensitiveDataType.HEALTH)).toBe(false);
    expect(canShareWithThirdParty(SensitiveDataType.EDUCATIONAL)).toBe(true);
  });

  describe('isRetentionExpired', () => {
    const now = new Date('2026-03-01T00:00:00.000Z');

    it('should expire on the last day of the period', () => {
      const collected = new Date(now.getTime() - 90 * DAY);
      expect(isRetentionExpired(SensitiveDataType.LOCATION, collected, now)).toBe(true);
    });

    it('should not expire a day earlier', () => {
      const collected = new Date(now.getTime() - 89 * DAY);
      expect(isRetentionExpired(SensitiveDataType.LOCATION, collected, now)).toBe(false);
    });

    it('should count whole days only', () => {
      const collected = new Date(now.getTime() - 90 * DAY + 1);
      expect(isRetentionExpired(SensitiveDataType.LOCATION, collected, now)).toBe(false);
    });
  });

  describe('catalogues', () => {
    it('should list the seven privacy rights with unique ids', () => {
      const ids = PRIVACY_RIGHTS.map((right) => right.id);
      expect(ids).toEqual(['access', 'rectification', 'erasure', 'portability', 'withdraw', 'object', 'complaint']);
    });

    it('should describe each collected data category', () => {
      expect(DATA_CATEGORIES.map((category) => category.name)).toEqual([
        'Account Information',
        'Educational Data',
        'Usage Analytics',
        'Device Information',
      ]);
    });
  });
});
