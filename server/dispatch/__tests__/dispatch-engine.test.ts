import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { mkdtemp, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { DispatchEngine, DispatchStateError } from '../dispatch-engine.js';
import type { MailTransport, OutgoingMail, SendResult } from '../transport.js';
import { DispatchNotConfirmedError, MailTransportError } from '../../types/errors.js';
import type { GenerationOutcome, PersonRecord } from '../../types/letters.js';

vi.mock('../../utils/logger.js', () => {
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  return { loggers: { dispatch: logger } };
});

const NOW = new Date('2024-05-01T08:00:00.000Z');

class FakeTransport implements MailTransport {
  readonly provider = 'fake';
  sent: OutgoingMail[] = [];
  failFor = new Set<string>();

  async send(mail: OutgoingMail): Promise<SendResult> {
    if (this.failFor.has(mail.to)) {
      throw new MailTransportError(`rejected ${mail.to}`, this.provider);
    }
    this.sent.push(mail);
    return { messageId: `msg-${this.sent.length}` };
  }
}

function person(id: string, name: string, email: string | null): PersonRecord {
  return { id, name, unit: 'Engineering', account: '1', bank: 'Bank A', email, proposals: [], rowNumber: 2 };
}

describe('DispatchEngine', () => {
  let dir: string;
  let transport: FakeTransport;
  let sleep: Mock<(ms: number) => Promise<void>>;
  let generation: GenerationOutcome[];

  const ana = person('1', 'Ana', 'ana@x.com');
  const budi = person('2', 'Budi', null);
  const citra = person('3', 'Citra', 'citra@x.com');
  const dewi = person('4', 'Dewi', 'dewi@x.com');

  function success(record: PersonRecord, file: string): GenerationOutcome {
    return {
      recordId: record.id,
      name: record.name,
      status: 'SUCCESS',
      documentName: file,
      documentPath: join(dir, file),
    };
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'dispatch-'));
    await writeFile(join(dir, 'ana.pdf'), 'pdf ana');
    await writeFile(join(dir, 'budi.pdf'), 'pdf budi');
    await writeFile(join(dir, 'citra.pdf'), 'pdf citra');
    transport = new FakeTransport();
    sleep = vi.fn<(ms: number) => Promise<void>>(async () => undefined);
    generation = [
      success(ana, 'ana.pdf'),
      success(budi, 'budi.pdf'),
      success(citra, 'citra.pdf'),
      { recordId: '4', name: 'Dewi', status: 'FAILED', reason: 'ConversionTimeout', detail: 'too slow' },
    ];
  });

  function dryRun(extra: { delayMs?: number; alreadySent?: Set<string> } = {}): DispatchEngine {
    return new DispatchEngine({
      mode: 'dry_run',
      transport,
      delayMs: extra.delayMs ?? 700,
      alreadySent: extra.alreadySent,
      sleep,
      clock: () => NOW,
    });
  }

  function live(delayMs = 700): DispatchEngine {
    return new DispatchEngine({ mode: 'live', transport, delayMs, sleep, clock: () => NOW });
  }

  describe('dry run', () => {
    it('simulates every sendable record without touching the transport', async () => {
      const result = await dryRun().run([ana, budi, citra, dewi], generation);

      expect(result.outcomes).toEqual([
        {
          recordId: '1',
          name: 'Ana',
          address: 'ana@x.com',
          status: 'DRY-RUN',
          timestamp: '2024-05-01T08:00:00.000Z',
          detail: 'Not sent (dry run): Compliance letter - Ana (1)',
        },
        {
          recordId: '2',
          name: 'Budi',
          address: '',
          status: 'SKIP',
          timestamp: '2024-05-01T08:00:00.000Z',
          detail: 'No email address',
        },
        {
          recordId: '3',
          name: 'Citra',
          address: 'citra@x.com',
          status: 'DRY-RUN',
          timestamp: '2024-05-01T08:00:00.000Z',
          detail: 'Not sent (dry run): Compliance letter - Citra (3)',
        },
      ]);
      expect(transport.sent).toEqual([]);
      expect(result.state).toBe('DONE');
    });

    it('may start without confirmation', async () => {
      const engine = dryRun();
      expect(engine.state).toBe('ARMED');
      await expect(engine.run([ana], generation)).resolves.toMatchObject({ mode: 'dry_run', state: 'DONE' });
    });
  });

  describe('eligibility', () => {
    it('leaves records without a generated document out of the report', async () => {
      const result = await dryRun().run([ana, dewi], generation);

      expect(result.outcomes.map(o => o.recordId)).toEqual(['1']);
      expect(result.ineligible).toBe(1);
    });

    it('skips a missing or empty document', async () => {
      await writeFile(join(dir, 'citra.pdf'), '');
      const withMissing = [...generation, success(person('5', 'Eko', 'eko@x.com'), 'eko.pdf')];

      const result = await dryRun().run([citra, person('5', 'Eko', 'eko@x.com')], withMissing);

      expect(result.outcomes.map(o => [o.status, o.detail])).toEqual([
        ['SKIP', `Document is empty: ${join(dir, 'citra.pdf')}`],
        ['SKIP', `Document not found: ${join(dir, 'eko.pdf')}`],
      ]);
    });

    it('skips records already sent by a previous run', async () => {
      const result = await dryRun({ alreadySent: new Set(['1']) }).run([ana, citra], generation);

      expect(result.outcomes.map(o => [o.recordId, o.status, o.detail])).toEqual([
        ['1', 'SKIP', 'Already sent in a previous run'],
        ['3', 'DRY-RUN', 'Not sent (dry run): Compliance letter - Citra (3)'],
      ]);
    });
  });

  describe('delay', () => {
    it('pauses only between consecutive attempts, never before a skip or the first attempt', async () => {
      await dryRun().run([ana, budi, citra], generation);

      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(700);
    });

    it('does not pause after leading skips', async () => {
      await dryRun().run([budi, ana], generation);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('does not pause when the delay is zero', async () => {
      await dryRun({ delayMs: 0 }).run([ana, citra], generation);
      expect(sleep).not.toHaveBeenCalled();
    });
  });

  describe('live', () => {
    it('refuses to run without confirmation', async () => {
      const engine = live();

      await expect(engine.run([ana], generation)).rejects.toBeInstanceOf(DispatchNotConfirmedError);
      expect(transport.sent).toEqual([]);
      expect(engine.state).toBe('ARMED');
    });

    it('sends each document once and reports failures per record', async () => {
      transport.failFor.add('citra@x.com');
      const engine = live();
      engine.confirm();

      const result = await engine.run([ana, budi, citra], generation);

      expect(result.outcomes.map(o => [o.recordId, o.status, o.detail, o.messageId])).toEqual([
        ['1', 'OK', 'Sent', 'msg-1'],
        ['2', 'SKIP', 'No email address', undefined],
        ['3', 'FAIL', 'rejected citra@x.com', undefined],
      ]);
      expect(result.counts).toEqual({ OK: 1, FAIL: 1, SKIP: 1, 'DRY-RUN': 0 });
      expect(sleep).toHaveBeenCalledTimes(1);
    });

    it('attaches the document and fills the message templates', async () => {
      const engine = new DispatchEngine({
        mode: 'live',
        transport,
        delayMs: 0,
        templates: { subject: 'Letter for {{name}} {{nickname}}', body: '{{document}} / {{proposal_count}}' },
        clock: () => NOW,
      });
      engine.confirm();

      await engine.run([ana], generation);

      expect(transport.sent).toEqual([
        {
          to: 'ana@x.com',
          subject: 'Letter for Ana {{nickname}}',
          text: 'ana.pdf / 0',
          attachments: [{ filename: 'ana.pdf', content: Buffer.from('pdf ana') }],
        },
      ]);
    });
  });

  describe('state machine', () => {
    it('runs only once', async () => {
      const engine = dryRun();
      await engine.run([ana], generation);

      await expect(engine.run([ana], generation)).rejects.toBeInstanceOf(DispatchStateError);
    });

    it('confirms only from ARMED', () => {
      const engine = live();
      engine.confirm();

      expect(engine.state).toBe('CONFIRMED');
      expect(() => engine.confirm()).toThrow('Cannot confirm from state CONFIRMED');
    });

    it('stops between records when cancelled and keeps earlier outcomes', async () => {
      const controller = new AbortController();
      sleep.mockImplementation(async () => {
        controller.abort();
      });

      const engine = dryRun();
      const result = await engine.run([ana, citra, budi], generation, { signal: controller.signal });

      expect(result.state).toBe('CANCELLED');
      expect(engine.state).toBe('CANCELLED');
      expect(result.outcomes.map(o => [o.recordId, o.status])).toEqual([
        ['1', 'DRY-RUN'],
        ['3', 'DRY-RUN'],
      ]);
    });
  });
});
