/**
 * 設定管理モジュール
 *
 * - 型安全な設定定義
 * - 環境変数からの読み込み
 * - デフォルト値管理
 * - 環境別プリセット
 */

// 設定スキーマとバリデーション
export {
  type EnrollmentConfig,
  type EnrollmentConfigInput,
  type ProcessingConfig,
  type BusinessRulesConfig,
  type ObservabilityConfig,
  type LogLevel,
  type Environment,
  EnrollmentConfigSchema,
  EnvironmentSchema,
  ProcessingConfigSchema,
  BusinessRulesConfigSchema,
  ObservabilityConfigSchema,
  LogLevelSchema,
  validateConfig,
  DEVELOPMENT_CONFIG,
  TEST_CONFIG,
  PRODUCTION_CONFIG
} from './enrollment-config';

// デフォルト設定値
export { DEFAULT_ENROLLMENT_CONFIG } from './default-config';

// 設定ローダー
export {
  ConfigLoader,
  mergeConfig,
  loadConfig,
  getCurrentConfig,
  reloadConfig,
  setConfigForTesting
} from './config-loader';
