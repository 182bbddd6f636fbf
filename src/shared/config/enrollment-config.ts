import { z } from 'zod';

/**
 * 履修管理設定定義
 *
 * - Zodによる実行時検証
 * - 環境別設定: 開発・テスト・本番での違い
 * - デフォルト値: 合理的なデフォルト設定
 */

// === 処理設定 ===
export const ProcessingConfigSchema = z.object({
  /** 楽観的ロック競合時のリトライ */
  retry: z.object({
    maxAttempts: z.number().int().min(1).max(10).default(3),
    baseDelayMs: z.number().int().min(0).max(10000).default(50),
    exponentialBackoff: z.boolean().default(true)
  }).default({})
});

// === ビジネスルール設定 ===
export const BusinessRulesConfigSchema = z.object({
  enrollment: z.object({
    /** 同時に履修できる単位数の上限（上限ちょうどは許可） */
    maxCreditsPerTerm: z.number().int().min(0).max(200).default(24)
  }).default({})
});

// === ログ設定 ===
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const ObservabilityConfigSchema = z.object({
  logging: z.object({
    level: LogLevelSchema.default('info'),
    enableAuditLog: z.boolean().default(true)
  }).default({})
});

// === 統合設定スキーマ ===
export const EnvironmentSchema = z.enum(['development', 'test', 'staging', 'production']);

export const EnrollmentConfigSchema = z.object({
  environment: EnvironmentSchema.default('development'),

  processing: ProcessingConfigSchema.default({}),
  businessRules: BusinessRulesConfigSchema.default({}),
  observability: ObservabilityConfigSchema.default({})
});

// === 型定義 ===
export type ProcessingConfig = z.infer<typeof ProcessingConfigSchema>;
export type BusinessRulesConfig = z.infer<typeof BusinessRulesConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type ObservabilityConfig = z.infer<typeof ObservabilityConfigSchema>;
export type EnrollmentConfig = z.infer<typeof EnrollmentConfigSchema>;
export type Environment = z.infer<typeof EnvironmentSchema>;

/**
 * 部分的な設定（環境変数・プリセット・オーバーライド用）
 */
export type EnrollmentConfigInput = {
  environment?: Environment;
  processing?: { retry?: Partial<ProcessingConfig['retry']> };
  businessRules?: { enrollment?: Partial<BusinessRulesConfig['enrollment']> };
  observability?: { logging?: Partial<ObservabilityConfig['logging']> };
};

// === 設定検証ヘルパー ===
export function validateConfig(input: unknown): {
  success: true;
  data: EnrollmentConfig;
} | {
  success: false;
  error: z.ZodError;
} {
  const result = EnrollmentConfigSchema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  } else {
    return { success: false, error: result.error };
  }
}

// === 環境別設定プリセット ===
export const DEVELOPMENT_CONFIG: EnrollmentConfigInput = {
  environment: 'development',
  observability: {
    logging: {
      level: 'debug',
      enableAuditLog: true
    }
  }
};

export const TEST_CONFIG: EnrollmentConfigInput = {
  environment: 'test',
  processing: {
    retry: {
      maxAttempts: 3,
      baseDelayMs: 0,
      exponentialBackoff: false
    }
  },
  observability: {
    logging: {
      level: 'silent',
      enableAuditLog: false
    }
  }
};

export const PRODUCTION_CONFIG: EnrollmentConfigInput = {
  environment: 'production',
  processing: {
    retry: {
      maxAttempts: 5,
      baseDelayMs: 100,
      exponentialBackoff: true
    }
  },
  observability: {
    logging: {
      level: 'info',
      enableAuditLog: true
    }
  }
};
