import { describe, it, expect } from 'vitest';
import {
  ConfigValidationError,
  DEFAULT_COLUMNS,
  DEFAULT_TEMPLATE_PATH,
  loadAppConfig,
  requireMailConfig,
} from '../app-config.js';

describe('app-config', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadAppConfig({});

    expect(config.converter).toEqual({ binaryPath: null, timeoutMs: 60000 });
    expect(config.output).toEqual({ dir: 'output', documentPrefix: 'SPTJM', archiveName: 'compliance-letters' });
    expect(config.letter).toEqual({ templatePath: DEFAULT_TEMPLATE_PATH, place: '' });
    expect(config.mail).toEqual({ apiKey: null, fromAddress: null, fromName: '', delayMs: 700 });
    expect(config.columns).toEqual(DEFAULT_COLUMNS);
  });

  it('reads every variable', () => {
    const config = loadAppConfig({
      SOFFICE_PATH: '/opt/lo/soffice',
      CONVERTER_TIMEOUT_MS: '30000',
      OUTPUT_DIR: '/tmp/run',
      LETTER_PLACE: 'Springfield',
      DOCUMENT_PREFIX: 'LTR',
      RESEND_API_KEY: 'test-secret',
      MAIL_FROM_ADDRESS: 'letters@example.com',
      MAIL_FROM_NAME: 'Letters Office',
      DISPATCH_DELAY_MS: '0',
      COLUMN_ID: 'Staff ID',
    });

    expect(config.converter).toEqual({ binaryPath: '/opt/lo/soffice', timeoutMs: 30000 });
    expect(config.output.dir).toBe('/tmp/run');
    expect(config.output.documentPrefix).toBe('LTR');
    expect(config.letter.place).toBe('Springfield');
    expect(config.mail).toEqual({
      apiKey: 'test-secret',
      fromAddress: 'letters@example.com',
      fromName: 'Letters Office',
      delayMs: 0,
    });
    expect(config.columns.id).toBe('Staff ID');
    expect(config.columns.name).toBe('Nama');
  });

  it('uses the sender address as the display name by default', () => {
    expect(loadAppConfig({ MAIL_FROM_ADDRESS: 'letters@example.com' }).mail.fromName).toBe('letters@example.com');
  });

  it('treats blank values as unset', () => {
    expect(loadAppConfig({ SOFFICE_PATH: '   ' }).converter.binaryPath).toBeNull();
  });

  it('rejects invalid numbers with the offending field', () => {
    expect(() => loadAppConfig({ CONVERTER_TIMEOUT_MS: 'soon' })).toThrow(ConfigValidationError);
    expect(() => loadAppConfig({ CONVERTER_TIMEOUT_MS: '0' })).toThrow('CONVERTER_TIMEOUT_MS must be an integer >= 1');
    expect(() => loadAppConfig({ DISPATCH_DELAY_MS: '-5' })).toThrow('DISPATCH_DELAY_MS must be an integer >= 0');
  });

  it('rejects an invalid sender address', () => {
    expect(() => loadAppConfig({ MAIL_FROM_ADDRESS: 'letters' })).toThrow(
      'MAIL_FROM_ADDRESS is not a valid email address',
    );
  });

  it('returns a frozen configuration', () => {
    const config = loadAppConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.mail)).toBe(true);
  });

  describe('requireMailConfig', () => {
    it('requires the API key and the sender', () => {
      expect(() => requireMailConfig(loadAppConfig({}))).toThrow('RESEND_API_KEY is required for live dispatch');
      expect(() => requireMailConfig(loadAppConfig({ RESEND_API_KEY: 'test-secret' }))).toThrow(
        'MAIL_FROM_ADDRESS is required for live dispatch',
      );
    });

    it('returns the resolved settings', () => {
      const mail = requireMailConfig(
        loadAppConfig({ RESEND_API_KEY: 'test-secret', MAIL_FROM_ADDRESS: 'letters@example.com' }),
      );
      expect(mail).toEqual({
        apiKey: 'test-secret',
        fromAddress: 'letters@example.com',
        fromName: 'letters@example.com',
        delayMs: 700,
      });
    });
  });
});
