import { describe, it, expect, vi, beforeEach } from 'vitest';
import { formatSender, ResendTransport } from '../transport.js';
import { MailTransportError } from '../../types/errors.js';

const { sendMock } = vi.hoisted(() => ({ sendMock: vi.fn() }));

vi.mock('resend', () => ({
  Resend: class {
    emails = { send: sendMock };
  },
}));

vi.mock('../../utils/logger.js', () => {
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  return { loggers: { mail: logger } };
});

const config = { apiKey: 'test-secret', fromAddress: 'letters@example.com', fromName: 'Letters Office' };

const mail = {
  to: 'ana@x.com',
  subject: 'Compliance letter - Ana (1001)',
  text: 'Dear Ana',
  attachments: [{ filename: 'SPTJM_ana_1001.pdf', content: Buffer.from('pdf') }],
};

describe('transport', () => {
  beforeEach(() => {
    sendMock.mockReset();
  });

  it('formats the sender', () => {
    expect(formatSender('Letters Office', 'letters@example.com')).toBe('Letters Office <letters@example.com>');
    expect(formatSender('', 'letters@example.com')).toBe('letters@example.com');
    expect(formatSender('letters@example.com', 'letters@example.com')).toBe('letters@example.com');
  });

  it('sends through Resend and returns the message id', async () => {
    sendMock.mockResolvedValueOnce({ data: { id: 'msg-123' }, error: null });

    const result = await new ResendTransport(config).send(mail);

    expect(result).toEqual({ messageId: 'msg-123' });
    expect(sendMock).toHaveBeenCalledWith({
      from: 'Letters Office <letters@example.com>',
      to: 'ana@x.com',
      subject: 'Compliance letter - Ana (1001)',
      text: 'Dear Ana',
      attachments: [{ filename: 'SPTJM_ana_1001.pdf', content: Buffer.from('pdf') }],
    });
  });

  it('throws the error returned by the provider', async () => {
    sendMock.mockResolvedValueOnce({
      data: null,
      error: { name: 'validation_error', message: 'Invalid to address' },
    });

    await expect(new ResendTransport(config).send(mail)).rejects.toThrow(
      new MailTransportError('validation_error: Invalid to address', 'resend'),
    );
  });

  it('propagates network failures', async () => {
    sendMock.mockRejectedValueOnce(new Error('socket hang up'));

    await expect(new ResendTransport(config).send(mail)).rejects.toThrow('socket hang up');
  });
});
