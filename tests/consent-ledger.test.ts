/**
 * Consent Ledger Tests
 *
 * Tests for the consent state machine, data-subject rights and the
 * bounded access log.
 */

import {
  ConsentLedger,
  ConsentStatus,
  MemoryKeyValueStore,
  StoreKeys,
  createConsentLedger,
  Logger,
  LogLevel,
  Result,
} from '../src/index.js';

const silent = new Logger({ level: LogLevel.SILENT });
const DAY_MS = 24 * 60 * 60 * 1000;

function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

describe('ConsentLedger', () => {
  let store: MemoryKeyValueStore;
  let now: number;
  let ledger: ConsentLedger;

  beforeEach(() => {
    store = new MemoryKeyValueStore();
    now = Date.UTC(2025, 5, 1, 9, 30, 0);
    ledger = new ConsentLedger(store, { logger: silent }, () => now);
  });

  async function status(): Promise<ConsentStatus> {
    return unwrap(await ledger.status());
  }

  describe('recordConsent and status', () => {
    it('should start without consent', async () => {
      const current = await status();

      expect(current.state).toBe('NO_CONSENT');
      expect(current.hasConsent).toBe(false);
      expect(current.policyVersion).toBeNull();
      expect(current.consentDate).toBeNull();
      expect(current.needsRenewal).toBe(true);
      expect(current.isValid).toBe(false);
    });

    it('should be valid right after consent under the current policy', async () => {
      unwrap(await ledger.recordConsent({ dataProcessing: true, analytics: false }));

      const current = await status();

      expect(current).toEqual({
        state: 'GRANTED',
        hasConsent: true,
        dataProcessing: true,
        analytics: false,
        marketing: false,
        thirdPartySharing: false,
        policyVersion: '1.0.0',
        consentDate: new Date(now),
        ageVerified: false,
        hasParentalConsent: false,
        isCurrentPolicy: true,
        needsRenewal: false,
        isValid: true,
      });
    });

    it('should need renewal thirteen months later', async () => {
      await ledger.recordConsent({ dataProcessing: true, analytics: false });

      now += 13 * 30 * DAY_MS;
      const current = await status();

      expect(current.needsRenewal).toBe(true);
      expect(current.isValid).toBe(false);
      expect(current.state).toBe('STALE');
    });

    it('should expire after twelve months of thirty days', async () => {
      await ledger.recordConsent({ dataProcessing: true, analytics: false });

      now += 359 * DAY_MS;
      expect((await status()).isValid).toBe(true);

      now += DAY_MS;
      expect((await status()).needsRenewal).toBe(true);
    });

    it('should go stale when the policy version changes', async () => {
      await ledger.recordConsent({ dataProcessing: true, analytics: true });

      const updated = new ConsentLedger(store, { policyVersion: '2.0.0', logger: silent }, () => now);
      const current = unwrap(await updated.status());

      expect(current.isCurrentPolicy).toBe(false);
      expect(current.state).toBe('STALE');
      expect(current.isValid).toBe(false);
    });

    it('should be valid again after re-consent', async () => {
      await ledger.recordConsent({ dataProcessing: true, analytics: false });
      now += 400 * DAY_MS;
      expect((await status()).state).toBe('STALE');

      await ledger.recordConsent({ dataProcessing: true, analytics: false });

      expect((await status()).state).toBe('GRANTED');
    });

    it('should not be valid without data processing consent', async () => {
      await ledger.recordConsent({ dataProcessing: false, analytics: true });

      const current = await status();

      expect(current.hasConsent).toBe(true);
      expect(current.state).toBe('WITHDRAWN');
      expect(current.isValid).toBe(false);
    });

    it('should record optional grants', async () => {
      await ledger.recordConsent({
        dataProcessing: true,
        analytics: true,
        marketing: true,
        thirdPartySharing: true,
      });

      expect(await ledger.canUseAnalytics()).toBe(true);
      expect(await ledger.canSendMarketing()).toBe(true);
      expect(await ledger.canShareWithThirdParty()).toBe(true);
    });

    it('should write the parental flag only for minors', async () => {
      await ledger.recordConsent({ dataProcessing: true, analytics: false });
      expect(await store.containsKey(StoreKeys.PARENTAL_CONSENT)).toBe(false);

      await ledger.recordConsent({
        dataProcessing: true,
        analytics: false,
        isMinor: true,
        hasParentalConsent: true,
      });
      expect((await status()).hasParentalConsent).toBe(true);
    });

    it('should store the timestamp as ISO-8601', async () => {
      await ledger.recordConsent({ dataProcessing: true, analytics: false });

      expect(await store.getString(StoreKeys.CONSENT_TIMESTAMP)).toBe('2025-06-01T09:30:00.000Z');
      expect(await store.getString(StoreKeys.CONSENT_VERSION)).toBe('1.0.0');
    });

    it('should report hasValidConsent', async () => {
      expect(await ledger.hasValidConsent()).toBe(false);

      await ledger.recordConsent({ dataProcessing: true, analytics: false });

      expect(await ledger.hasValidConsent()).toBe(true);
    });
  });

  describe('withdraw', () => {
    beforeEach(async () => {
      await ledger.recordConsent({ dataProcessing: true, analytics: true, marketing: true });
    });

    it('should clear selected grants only', async () => {
      unwrap(await ledger.withdraw(['analytics']));

      const current = await status();

      expect(current.analytics).toBe(false);
      expect(current.marketing).toBe(true);
      expect(current.hasConsent).toBe(true);
      expect(current.isValid).toBe(true);
    });

    it('should clear every grant and the master flag for all', async () => {
      unwrap(await ledger.withdraw('all'));

      const current = await status();

      expect(current.state).toBe('WITHDRAWN');
      expect(current.hasConsent).toBe(false);
      expect(current.dataProcessing).toBe(false);
      expect(current.analytics).toBe(false);
      expect(current.marketing).toBe(false);
      expect(current.isValid).toBe(false);
    });

    it('should leave the access log untouched', async () => {
      await ledger.logAccess('profile', 'display');

      await ledger.withdraw('all');

      expect(unwrap(await ledger.accessLog())).toHaveLength(1);
    });
  });

  describe('verifyAge', () => {
    it('should record the parental flag for minors', async () => {
      unwrap(await ledger.verifyAge(15, true));

      const current = await status();

      expect(current.ageVerified).toBe(true);
      expect(current.hasParentalConsent).toBe(true);
    });

    it('should not record the parental flag for adults', async () => {
      unwrap(await ledger.verifyAge(25, false));

      expect((await status()).ageVerified).toBe(true);
      expect(await store.containsKey(StoreKeys.PARENTAL_CONSENT)).toBe(false);
    });

    it('should reject impossible ages', async () => {
      for (const age of [-1, 16.5, 151, Number.NaN]) {
        const result = await ledger.verifyAge(age, false);

        expect(result.ok).toBe(false);
        if (!result.ok) {
          expect(result.error.code).toBe('INVALID_AGE');
        }
      }
      expect(store.size()).toBe(0);
    });
  });

  describe('data retention acknowledgement', () => {
    it('should be false until acknowledged', async () => {
      expect(await ledger.hasAcknowledgedDataRetention()).toBe(false);

      unwrap(await ledger.acknowledgeDataRetention());

      expect(await ledger.hasAcknowledgedDataRetention()).toBe(true);
    });
  });

  describe('access log', () => {
    it('should keep only the most recent 100 of 150 entries', async () => {
      for (let i = 0; i < 150; i++) {
        await ledger.logAccess('notes', `purpose-${i}`);
      }

      const log = unwrap(await ledger.accessLog());

      expect(log).toHaveLength(100);
      expect(log[0]?.purpose).toBe('purpose-50');
      expect(log[99]?.purpose).toBe('purpose-149');
    });

    it('should default the actor to system', async () => {
      await ledger.logAccess('profile', 'export');

      expect(unwrap(await ledger.accessLog())).toEqual([
        { timestamp: '2025-06-01T09:30:00.000Z', dataType: 'profile', purpose: 'export', accessedBy: 'system' },
      ]);
    });

    it('should honour a custom capacity', async () => {
      const small = createConsentLedger(store, { maxAccessLogEntries: 3, logger: silent });

      for (let i = 0; i < 5; i++) {
        await small.logAccess('notes', `p${i}`, 'tutor');
      }

      expect(unwrap(await small.accessLog()).map((e) => e.purpose)).toEqual(['p2', 'p3', 'p4']);
    });

    it('should skip unreadable entries', async () => {
      const valid = JSON.stringify({ timestamp: 't', dataType: 'd', purpose: 'p', accessedBy: 'a' });
      await store.setStringList(StoreKeys.ACCESS_LOG, ['not json', valid, JSON.stringify({ foo: 1 })]);

      expect(unwrap(await ledger.accessLog())).toEqual([
        { timestamp: 't', dataType: 'd', purpose: 'p', accessedBy: 'a' },
      ]);
    });

    it('should be empty when nothing was logged', async () => {
      expect(unwrap(await ledger.accessLog())).toEqual([]);
    });
  });

  describe('exportAll', () => {
    it('should bucket stored data and skip key-vault slots', async () => {
      const seeded = new MemoryKeyValueStore({
        initial: {
          app_encryption_key: 'k'.repeat(32),
          encryption_key_created_at: '2025-01-01T00:00:00.000Z',
          user_privacy_consent: true,
          privacy_policy_seen: true,
          theme_pref: 'dark',
          notification_setting: 'daily',
          display_name: 'Asha',
          streak_days: 12,
        },
      });
      const exporter = new ConsentLedger(seeded, { logger: silent }, () => now);

      const snapshot = unwrap(await exporter.exportAll());

      expect(snapshot).toEqual({
        exportDate: '2025-06-01T09:30:00.000Z',
        appName: 'Offline Learning App',
        dataFormatVersion: '1.0',
        consentHistory: { user_privacy_consent: true, privacy_policy_seen: true },
        preferences: { theme_pref: 'dark', notification_setting: 'daily' },
        userData: { display_name: 'Asha', streak_days: 12 },
      });
    });

    it('should use the configured app name', async () => {
      const named = new ConsentLedger(store, { appName: 'Study Buddy', logger: silent });

      expect(unwrap(await named.exportAll()).appName).toBe('Study Buddy');
    });
  });

  describe('eraseAll', () => {
    it('should clear the whole store', async () => {
      await ledger.recordConsent({ dataProcessing: true, analytics: false });
      await ledger.logAccess('notes', 'sync');
      await store.setString(StoreKeys.ENCRYPTION_KEY, 'k'.repeat(32));

      unwrap(await ledger.eraseAll());

      expect(store.size()).toBe(0);
      expect((await status()).state).toBe('NO_CONSENT');
    });
  });

  describe('rectify', () => {
    it('should store each value with its kind', async () => {
      unwrap(await ledger.rectify('display_name', 'Asha K'));
      unwrap(await ledger.rectify('grade', 9));
      unwrap(await ledger.rectify('average_score', 92.5));
      unwrap(await ledger.rectify('dark_mode', true));

      expect(store.kindOf('display_name')).toBe('string');
      expect(store.kindOf('grade')).toBe('int');
      expect(store.kindOf('average_score')).toBe('float');
      expect(store.kindOf('dark_mode')).toBe('bool');
      expect(await store.getFloat('average_score')).toBe(92.5);
    });

    it('should refuse reserved slots', async () => {
      const result = await ledger.rectify(StoreKeys.ENCRYPTION_KEY, 'attacker-chosen');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('RESERVED_KEY');
        expect(result.error.category).toBe('validation');
      }
      expect(await store.containsKey(StoreKeys.ENCRYPTION_KEY)).toBe(false);
    });

    it('should refuse empty names and non-finite numbers', async () => {
      const empty = await ledger.rectify('  ', 'x');
      const nan = await ledger.rectify('grade', Number.NaN);

      expect(empty.ok || nan.ok).toBe(false);
      if (!empty.ok && !nan.ok) {
        expect(empty.error.code).toBe('FIELD_REQUIRED');
        expect(nan.error.code).toBe('INVALID_NUMBER');
      }
    });
  });

  describe('store failures', () => {
    beforeEach(() => {
      store.simulateOutage(true);
    });

    it('should return failures instead of throwing', async () => {
      const results = await Promise.all([
        ledger.recordConsent({ dataProcessing: true, analytics: true }),
        ledger.status(),
        ledger.withdraw('all'),
        ledger.exportAll(),
        ledger.eraseAll(),
        ledger.logAccess('notes', 'sync'),
        ledger.accessLog(),
        ledger.rectify('display_name', 'x'),
        ledger.verifyAge(20, false),
        ledger.acknowledgeDataRetention(),
      ]);

      for (const result of results) {
        expect(result.ok).toBe(false);
        if (!result.ok) {
          expect(result.error.code).toBe('STORAGE_UNAVAILABLE');
        }
      }
    });

    it('should treat unreadable flags as not granted', async () => {
      expect(await ledger.canUseAnalytics()).toBe(false);
      expect(await ledger.canSendMarketing()).toBe(false);
      expect(await ledger.canShareWithThirdParty()).toBe(false);
      expect(await ledger.hasAcknowledgedDataRetention()).toBe(false);
      expect(await ledger.hasValidConsent()).toBe(false);
    });
  });

  it('should reject a non-positive access-log capacity', () => {
    expect(() => new ConsentLedger(store, { maxAccessLogEntries: 0 })).toThrow(
      'maxAccessLogEntries must be positive'
    );
  });
});
