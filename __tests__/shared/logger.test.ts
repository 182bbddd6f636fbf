import { describe, test, expect, vi } from 'vitest';
import { type LogSink, createLogger } from '../../src/shared/logging/logger';

const createSink = () => ({
  debug: vi.fn<Parameters<LogSink['debug']>, void>(),
  info: vi.fn<Parameters<LogSink['info']>, void>(),
  warn: vi.fn<Parameters<LogSink['warn']>, void>(),
  error: vi.fn<Parameters<LogSink['error']>, void>()
});

describe('ロガー', () => {
  test('スコープを付けて出力する', () => {
    const sink = createSink();
    const logger = createLogger('enrollment', { level: 'debug', sink });

    logger.info('student registered', { studentId: 'S001' });

    expect(sink.info).toHaveBeenCalledWith('[enrollment] student registered', { studentId: 'S001' });
  });

  test('設定レベル未満のログは出力しない', () => {
    const sink = createSink();
    const logger = createLogger('enrollment', { level: 'warn', sink });

    logger.debug('debug');
    logger.info('info');
    logger.warn('warn');
    logger.error('error');

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledWith('[enrollment] warn', undefined);
    expect(sink.error).toHaveBeenCalledWith('[enrollment] error', undefined);
  });

  test('silent なら何も出力しない', () => {
    const sink = createSink();
    const logger = createLogger('enrollment', { level: 'silent', enableAuditLog: true, sink });

    logger.error('error');
    logger.audit('enroll', { studentId: 'S001' });

    expect(sink.error).not.toHaveBeenCalled();
    expect(sink.info).not.toHaveBeenCalled();
  });

  test('監査ログは info として出力する', () => {
    const sink = createSink();
    const logger = createLogger('enrollment', { level: 'info', enableAuditLog: true, sink });

    logger.audit('enroll', { studentId: 'S001', courseId: 'INF101' });

    expect(sink.info).toHaveBeenCalledWith('[enrollment] audit: enroll', {
      studentId: 'S001',
      courseId: 'INF101'
    });
  });

  test('監査ログを無効にすると出力しない', () => {
    const sink = createSink();
    const logger = createLogger('enrollment', { level: 'debug', enableAuditLog: false, sink });

    logger.audit('enroll', { studentId: 'S001' });

    expect(sink.info).not.toHaveBeenCalled();
  });
});
