import { z } from 'zod';
import { type Result, Ok, Err } from '../types/index';
import {
  type EnrollmentConfig,
  type EnrollmentConfigInput,
  type Environment,
  EnvironmentSchema,
  LogLevelSchema,
  validateConfig,
  DEVELOPMENT_CONFIG,
  TEST_CONFIG,
  PRODUCTION_CONFIG
} from './enrollment-config';
import { DEFAULT_ENROLLMENT_CONFIG } from './default-config';

/**
 * 設定読み込み・管理クラス
 *
 * 優先順位（後勝ち）:
 * 1. デフォルト設定
 * 2. 環境別プリセット
 * 3. 環境変数
 * 4. オーバーライド
 */

/**
 * ENROLLMENT_ で始まる環境変数（空文字は未設定として扱う）
 */
const EnvironmentVariablesSchema = z.object({
  ENROLLMENT_ENVIRONMENT: EnvironmentSchema.optional(),
  ENROLLMENT_MAX_CREDITS: z.coerce.number().int().min(0).optional(),
  ENROLLMENT_MAX_RETRY_ATTEMPTS: z.coerce.number().int().min(1).optional(),
  ENROLLMENT_LOG_LEVEL: LogLevelSchema.optional(),
  ENROLLMENT_AUDIT_LOG: z.enum(['true', 'false']).transform(value => value === 'true').optional()
});

/**
 * 環境変数から設定を読み込む
 */
function loadFromEnvironment(
  env: NodeJS.ProcessEnv
): Result<{ environment?: Environment; config: EnrollmentConfigInput }, z.ZodError> {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = EnvironmentVariablesSchema.safeParse(present);
  if (!parsed.success) {
    return Err(parsed.error);
  }

  const vars = parsed.data;
  const config: EnrollmentConfigInput = {
    processing: {
      retry: { maxAttempts: vars.ENROLLMENT_MAX_RETRY_ATTEMPTS }
    },
    businessRules: {
      enrollment: { maxCreditsPerTerm: vars.ENROLLMENT_MAX_CREDITS }
    },
    observability: {
      logging: {
        level: vars.ENROLLMENT_LOG_LEVEL,
        enableAuditLog: vars.ENROLLMENT_AUDIT_LOG
      }
    }
  };

  return Ok({ environment: vars.ENROLLMENT_ENVIRONMENT, config });
}

/**
 * 環境別プリセット設定を取得
 */
function getEnvironmentPreset(environment: Environment): EnrollmentConfigInput {
  switch (environment) {
    case 'development':
      return DEVELOPMENT_CONFIG;
    case 'test':
      return TEST_CONFIG;
    case 'production':
      return PRODUCTION_CONFIG;
    default:
      return {};
  }
}

/**
 * 部分設定のマージ（undefined の項目は上書きしない）
 */
export function mergeConfig(
  base: EnrollmentConfig,
  patch: EnrollmentConfigInput
): EnrollmentConfig {
  const retry = patch.processing?.retry;
  const enrollment = patch.businessRules?.enrollment;
  const logging = patch.observability?.logging;

  return {
    environment: patch.environment ?? base.environment,
    processing: {
      retry: {
        maxAttempts: retry?.maxAttempts ?? base.processing.retry.maxAttempts,
        baseDelayMs: retry?.baseDelayMs ?? base.processing.retry.baseDelayMs,
        exponentialBackoff: retry?.exponentialBackoff ?? base.processing.retry.exponentialBackoff
      }
    },
    businessRules: {
      enrollment: {
        maxCreditsPerTerm: enrollment?.maxCreditsPerTerm ?? base.businessRules.enrollment.maxCreditsPerTerm
      }
    },
    observability: {
      logging: {
        level: logging?.level ?? base.observability.logging.level,
        enableAuditLog: logging?.enableAuditLog ?? base.observability.logging.enableAuditLog
      }
    }
  };
}

/**
 * 設定ローダークラス
 */
export class ConfigLoader {
  private static instance: ConfigLoader | undefined;
  private cachedConfig: EnrollmentConfig | null = null;

  private constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * シングルトンインスタンス取得
   */
  static getInstance(): ConfigLoader {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = new ConfigLoader();
    }
    return ConfigLoader.instance;
  }

  /**
   * テスト用: 任意の環境変数を読むローダーを作成
   */
  static withEnvironment(env: NodeJS.ProcessEnv): ConfigLoader {
    return new ConfigLoader(env);
  }

  /**
   * 設定を読み込み・検証
   */
  load(overrides?: EnrollmentConfigInput): Result<EnrollmentConfig, z.ZodError> {
    const envResult = loadFromEnvironment(this.env);
    if (!envResult.success) {
      return envResult;
    }

    const environment: Environment =
      overrides?.environment ??
      envResult.data.environment ??
      (this.env.NODE_ENV === 'test' ? 'test' : DEFAULT_ENROLLMENT_CONFIG.environment);

    let config = mergeConfig(DEFAULT_ENROLLMENT_CONFIG, getEnvironmentPreset(environment));
    config = mergeConfig(config, envResult.data.config);
    if (overrides) {
      config = mergeConfig(config, overrides);
    }
    config = { ...config, environment };

    const validationResult = validateConfig(config);
    if (!validationResult.success) {
      return Err(validationResult.error);
    }

    this.cachedConfig = validationResult.data;
    return Ok(validationResult.data);
  }

  /**
   * キャッシュされた設定を取得
   */
  getCached(): EnrollmentConfig | null {
    return this.cachedConfig;
  }

  /**
   * キャッシュをクリア
   */
  clearCache(): void {
    this.cachedConfig = null;
  }

  /**
   * 設定を直接セット（検証済みの値のみ）
   */
  setCached(config: EnrollmentConfig): void {
    this.cachedConfig = config;
  }

  /**
   * 設定をリロード
   */
  reload(overrides?: EnrollmentConfigInput): Result<EnrollmentConfig, z.ZodError> {
    this.clearCache();
    return this.load(overrides);
  }
}

/**
 * 設定を読み込む便利関数
 */
export function loadConfig(overrides?: EnrollmentConfigInput): Result<EnrollmentConfig, z.ZodError> {
  return ConfigLoader.getInstance().load(overrides);
}

/**
 * 現在の設定を取得する便利関数
 */
export function getCurrentConfig(): EnrollmentConfig {
  const loader = ConfigLoader.getInstance();
  const cached = loader.getCached();
  if (cached) {
    return cached;
  }

  const result = loader.load();
  if (result.success) {
    return result.data;
  }

  // フォールバック: デフォルト設定を返す（検証なし）
  console.warn('Failed to load configuration, using defaults:', result.error.message);
  return DEFAULT_ENROLLMENT_CONFIG;
}

/**
 * 設定をリロードする便利関数
 */
export function reloadConfig(overrides?: EnrollmentConfigInput): Result<EnrollmentConfig, z.ZodError> {
  return ConfigLoader.getInstance().reload(overrides);
}

/**
 * テスト用: 設定を強制的にセット
 */
export function setConfigForTesting(config: EnrollmentConfig): void {
  ConfigLoader.getInstance().setCached(config);
}
