import type { EnrollmentConfig } from './enrollment-config';

/**
 * デフォルト設定値
 *
 * 環境変数が不完全でも動作する
 */
export const DEFAULT_ENROLLMENT_CONFIG: EnrollmentConfig = {
  environment: 'development',

  processing: {
    retry: {
      maxAttempts: 3,
      baseDelayMs: 50,
      exponentialBackoff: true
    }
  },

  businessRules: {
    enrollment: {
      maxCreditsPerTerm: 24
    }
  },

  observability: {
    logging: {
      level: 'info',
      enableAuditLog: true
    }
  }
};
