/**
 * Data Classification Module
 *
 * Retention and sharing rules per category of sensitive data, plus the
 * user-facing catalogues of privacy rights and collected data.
 *
 * @packageDocumentation
 */

export enum SensitiveDataType {
  PERSONAL_IDENTIFIABLE = 'PERSONAL_IDENTIFIABLE',
  FINANCIAL = 'FINANCIAL',
  HEALTH = 'HEALTH',
  LOCATION = 'LOCATION',
  BIOMETRIC = 'BIOMETRIC',
  EDUCATIONAL = 'EDUCATIONAL',
}

const RETENTION_DAYS: Record<SensitiveDataType, number> = {
  [SensitiveDataType.PERSONAL_IDENTIFIABLE]: 365 * 3,
  [SensitiveDataType.FINANCIAL]: 365 * 7,
  [SensitiveDataType.HEALTH]: 365 * 5,
  [SensitiveDataType.LOCATION]: 90,
  [SensitiveDataType.BIOMETRIC]: 365,
  [SensitiveDataType.EDUCATIONAL]: 365 * 10,
};

const NEVER_SHARED = new Set<SensitiveDataType>([SensitiveDataType.BIOMETRIC, SensitiveDataType.HEALTH]);

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function retentionDays(type: SensitiveDataType): number {
  return RETENTION_DAYS[type];
}

/**
 * Every category is stored encrypted
 */
export function requiresEncryption(_type: SensitiveDataType): boolean {
  return true;
}

export function canShareWithThirdParty(type: SensitiveDataType): boolean {
  return !NEVER_SHARED.has(type);
}

/**
 * True once data of `type` collected at `collectedAt` has outlived its
 * retention period and must be deleted
 */
export function isRetentionExpired(type: SensitiveDataType, collectedAt: Date, now: Date = new Date()): boolean {
  const ageDays = Math.floor((now.getTime() - collectedAt.getTime()) / MS_PER_DAY);
  return ageDays >= RETENTION_DAYS[type];
}

export interface PrivacyRight {
  id: 'access' | 'rectification' | 'erasure' | 'portability' | 'withdraw' | 'object' | 'complaint';
  title: string;
  description: string;
  regulation: string;
}

export const PRIVACY_RIGHTS: readonly PrivacyRight[] = [
  {
    id: 'access',
    title: 'Right to Access',
    description: 'You can request a copy of all data we have about you.',
    regulation: 'GDPR Article 15, DPDP Act Section 11',
  },
  {
    id: 'rectification',
    title: 'Right to Rectification',
    description: 'You can correct any inaccurate personal data.',
    regulation: 'GDPR Article 16, DPDP Act Section 12',
  },
  {
    id: 'erasure',
    title: 'Right to Erasure',
    description: 'You can request deletion of your personal data.',
    regulation: 'GDPR Article 17, DPDP Act Section 12',
  },
  {
    id: 'portability',
    title: 'Right to Data Portability',
    description: 'You can export your data in a machine-readable format.',
    regulation: 'GDPR Article 20, DPDP Act Section 13',
  },
  {
    id: 'withdraw',
    title: 'Right to Withdraw Consent',
    description: 'You can withdraw consent at any time.',
    regulation: 'GDPR Article 7, DPDP Act Section 6',
  },
  {
    id: 'object',
    title: 'Right to Object',
    description: 'You can object to processing for marketing purposes.',
    regulation: 'GDPR Article 21',
  },
  {
    id: 'complaint',
    title: 'Right to Lodge Complaint',
    description: 'You can file a complaint with the Data Protection Board.',
    regulation: 'GDPR Article 77, DPDP Act Section 27',
  },
];

export interface DataCategory {
  name: string;
  description: string;
  purpose: string;
  retention: string;
  legalBasis: 'Contract performance' | 'Legitimate interest' | 'Consent';
}

export const DATA_CATEGORIES: readonly DataCategory[] = [
  {
    name: 'Account Information',
    description: 'Email, name, profile photo',
    purpose: 'To create and manage your account',
    retention: '3 years after account deletion',
    legalBasis: 'Contract performance',
  },
  {
    name: 'Educational Data',
    description: 'Notes, study progress, test scores',
    purpose: 'To provide personalized learning experience',
    retention: 'Until account deletion',
    legalBasis: 'Contract performance',
  },
  {
    name: 'Usage Analytics',
    description: 'App usage patterns, feature usage',
    purpose: 'To improve app functionality',
    retention: '2 years',
    legalBasis: 'Legitimate interest',
  },
  {
    name: 'Device Information',
    description: 'Device type, OS version, app version',
    purpose: 'Technical support and compatibility',
    retention: '1 year',
    legalBasis: 'Legitimate interest',
  },
];
