/**
 * Account Lifecycle Example
 *
 * This example demonstrates how to:
 * - Initialize the key vault on first launch
 * - Record consent and gate features on it
 * - Encrypt fields at rest and rotate the key without losing them
 * - Export, rectify and finally erase the user's data
 *
 * Run after a build: node dist/examples/account-lifecycle.js
 */

import {
  createDataProtectionSDK,
  loadConfigFromEnv,
  MemoryKeyValueStore,
  validateEmail,
  sanitize,
  maskEmail,
} from '../src/index.js';

async function main(): Promise<void> {
  console.log('=== Offline Privacy Kit - Account Lifecycle Example ===\n');

  const store = new MemoryKeyValueStore();
  const sdk = createDataProtectionSDK({ store, config: loadConfigFromEnv() });

  // =========================================================================
  // Part 1: First launch
  // =========================================================================
  const init = await sdk.initialize();
  if (!init.ok) {
    console.error('Initialization failed:', init.error.message);
    return;
  }
  console.log(`Key ready (rotated: ${init.value.rotated})\n`);

  // =========================================================================
  // Part 2: Consent
  // =========================================================================
  await sdk.consent.recordConsent({
    dataProcessing: true,
    analytics: false,
    isMinor: true,
    hasParentalConsent: true,
  });
  await sdk.consent.verifyAge(14, true);

  const status = await sdk.consent.status();
  if (status.ok) {
    console.log(`Consent state: ${status.value.state}`);
    console.log(`Analytics allowed: ${await sdk.consent.canUseAnalytics()}\n`);
  }

  // =========================================================================
  // Part 3: Profile fields
  // =========================================================================
  const email = validateEmail('  asha@example.com ');
  if (!email.ok) {
    console.error(email.error.message);
    return;
  }

  if (sdk.rateLimiter.allow('profile-save')) {
    await store.setString('profile_email', await sdk.cipher.encrypt(email.value));
    await store.setString('display_name', sanitize('Asha <b>V.</b>'));
    await sdk.consent.logAccess('profile', 'save', 'user');
    console.log(`Saved profile for ${maskEmail(email.value)}`);
  }

  // =========================================================================
  // Part 4: Key rotation with re-encryption
  // =========================================================================
  const storedEmail = (await store.getString('profile_email')) ?? '';
  const rotated = await sdk.rotateKey([storedEmail]);
  if (rotated.ok) {
    await store.setString('profile_email', rotated.value[0] ?? '');
    console.log(`Key rotated, email still reads ${maskEmail(await sdk.cipher.decrypt(rotated.value[0] ?? ''))}\n`);
  }

  // =========================================================================
  // Part 5: Data subject rights
  // =========================================================================
  await sdk.consent.rectify('display_name', 'Asha Verma');

  const exported = await sdk.consent.exportAll();
  if (exported.ok) {
    console.log('Export sections:', {
      userData: Object.keys(exported.value.userData),
      consentHistory: Object.keys(exported.value.consentHistory).length,
      preferences: Object.keys(exported.value.preferences),
    });
  }

  const deletion = await sdk.deleteAccount();
  console.log(`\nAccount deleted: ${deletion.complete}, keys left: ${store.size()}`);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
