import { describe, it, expect, vi } from 'vitest';
import { HeadsetSession, SessionError } from '../session.js';
import type { Logger } from '../util/logger.js';
import { FakeTransport, sleep } from './fake-transport.js';

const INIT = '3e 0c 00 00 00 00 02 00 00 0e 3c';
// Ack from the headset carrying sequence number 1
const ACK_SEQ_1 = '3e 01 01 00 00 00 00 02 3c';
const ACK_SEQ_0 = '3e 01 00 00 00 00 00 01 3c';
const INIT_REPLY = '3e 0c 00 00 00 00 01 01 0e 3c';

function fakeLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function setup(options: { initTimeoutMs?: number; initRetries?: number } = {}) {
  const transport = new FakeTransport();
  const logger = fakeLogger();
  const session = new HeadsetSession(transport, {
    initTimeoutMs: options.initTimeoutMs ?? 1000,
    initRetries: options.initRetries ?? 3,
    logger,
  });
  return { transport, logger, session };
}

describe('HeadsetSession', () => {
  describe('handshake', () => {
    it('sends Init first', async () => {
      const { transport, session } = setup();
      const done = session.run();

      await vi.waitFor(() => expect(transport.sent).toEqual([INIT]));

      session.stop();
      await done;
    });

    it('resends Init on timeout and gives up after the retries', async () => {
      const { transport, session } = setup({ initTimeoutMs: 10, initRetries: 2 });

      const err = await session.run().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(SessionError);
      expect(err).toMatchObject({ code: 'HandshakeTimeout' });
      expect(transport.sent).toEqual([INIT, INIT, INIT]);
    });

    it('stops during the handshake', async () => {
      const { session } = setup();
      const done = session.run();
      session.stop();
      await expect(done).resolves.toBeUndefined();
    });

    it('fails when the headset closes the link', async () => {
      const { transport, session } = setup();
      const done = session.run();
      transport.push(null);
      await expect(done).rejects.toMatchObject({ code: 'TransportClosed' });
    });
  });

  describe('after the handshake', () => {
    it('takes the sequence number from Acks', async () => {
      const { transport, session } = setup();
      const done = session.run();
      expect(session.awaitingAck).toBe(true);

      transport.reply(ACK_SEQ_1);
      await vi.waitFor(() => expect(session.awaitingAck).toBe(false));
      expect(session.sequenceNumber).toBe(1);

      session.stop();
      await done;
    });

    it('acknowledges commands and forwards their payloads', async () => {
      const { transport, session } = setup();
      const done = session.run();

      transport.reply(ACK_SEQ_1, INIT_REPLY);

      await expect(session.payloads.receive()).resolves.toEqual({ kind: 'InitReply' });
      expect(transport.sent).toEqual([INIT, ACK_SEQ_1]);

      session.stop();
      await done;
    });

    it('forwards Command2 payloads', async () => {
      const { transport, session } = setup();
      const done = session.run();

      transport.reply(ACK_SEQ_1, '3e0e01000000045b034203b63c');

      await expect(session.payloads.receive()).resolves.toEqual({ kind: 'SoundPressure', db: 0x42 });
      // acknowledging sequence 1 flips it to 0
      expect(transport.sent).toEqual([INIT, ACK_SEQ_0]);

      session.stop();
      await done;
    });

    it('reassembles frames split across reads', async () => {
      const { transport, session } = setup();
      const done = session.run();

      transport.reply('3e 01 01 00');
      await sleep(5);
      transport.reply('00 00 00 02 3c 3e 0c 00 00');
      await sleep(5);
      transport.reply('00 00 01 01 0e 3c');

      await expect(session.payloads.receive()).resolves.toEqual({ kind: 'InitReply' });
      expect(session.sequenceNumber).toBe(1);

      session.stop();
      await done;
    });

    it('waits for each read without racing a long-lived promise', async () => {
      const { transport, session } = setup();
      const done = session.run();
      transport.reply(ACK_SEQ_1);
      await vi.waitFor(() => expect(session.awaitingAck).toBe(false));

      const race = vi.spyOn(Promise, 'race');
      try {
        for (let i = 0; i < 2000; i++) {
          transport.reply(ACK_SEQ_1);
        }
        transport.reply(INIT_REPLY);
        await expect(session.payloads.receive()).resolves.toEqual({ kind: 'InitReply' });
        expect(race).not.toHaveBeenCalled();
      } finally {
        race.mockRestore();
      }

      session.stop();
      await done;
    });
  });

  describe('commands', () => {
    it('holds commands until the Init is acknowledged', async () => {
      const { transport, session } = setup();
      const done = session.run();
      session.send({ kind: 'GetCodec' });

      await sleep(20);
      expect(transport.sent).toEqual([INIT]);

      transport.reply(ACK_SEQ_1);
      await vi.waitFor(() => expect(transport.sent).toEqual([INIT, '3e 0c 01 00 00 00 02 12 02 23 3c']));
      expect(session.awaitingAck).toBe(true);

      session.stop();
      await done;
    });

    it('sends one command per Ack with the latest sequence number', async () => {
      const { transport, session } = setup();
      const done = session.run();
      transport.reply(ACK_SEQ_1);
      await vi.waitFor(() => expect(session.awaitingAck).toBe(false));

      session.send({ kind: 'GetCodec' });
      session.send({ kind: 'GetAncStatus' });

      await vi.waitFor(() => expect(transport.sent).toHaveLength(2));
      await sleep(20);
      expect(transport.sent).toEqual([INIT, '3e 0c 01 00 00 00 02 12 02 23 3c']);

      transport.reply(ACK_SEQ_0);
      await vi.waitFor(() => expect(transport.sent).toHaveLength(3));
      expect(transport.sent[2]).toBe('3e 0c 00 00 00 00 02 66 17 8b 3c');

      session.stop();
      await done;
    });

    it('rejects invalid commands when they are queued', () => {
      const { session } = setup();
      expect(() => session.send({ kind: 'ChangeEqualizerSetting', bands: {
        clearBass: 0, band400: 0, band1000: 0, band2500: 0, band6300: 0, band16000: 12,
      } })).toThrow(RangeError);
      expect(session.commands.size).toBe(0);
    });
  });

  describe('bad input', () => {
    it('skips frames with a bad checksum or unknown type and keeps reading the chunk', async () => {
      const { transport, session, logger } = setup();
      const done = session.run();

      transport.reply(
        ACK_SEQ_1,
        '3e 0c 00 00 00 00 01 01 0f 3c',
        '3e 05 00 00 00 00 00 05 3c',
        INIT_REPLY,
      );

      await expect(session.payloads.receive()).resolves.toEqual({ kind: 'InitReply' });
      expect(transport.sent).toEqual([INIT, ACK_SEQ_1]);
      expect(logger.warn).toHaveBeenCalledWith('bad checksum, got: 0xf, expected: 0xe; ignoring');
      expect(logger.warn).toHaveBeenCalledWith('unknown message type: 0x5; ignoring');

      session.stop();
      await done;
    });

    it('acknowledges a payload it cannot decode without forwarding it', async () => {
      const { transport, session, logger } = setup();
      const done = session.run();

      transport.reply(ACK_SEQ_1, '3e 0c 00 00 00 00 01 05 12 3c');

      await vi.waitFor(() => expect(transport.sent).toEqual([INIT, ACK_SEQ_1]));
      expect(logger.warn).toHaveBeenCalledWith('bad payload: Unknown payload type: 0x5');
      expect(session.payloads.size).toBe(0);

      session.stop();
      await done;
    });

    it('fails on bytes outside a frame', async () => {
      const { transport, session } = setup();
      const done = session.run();

      transport.reply(ACK_SEQ_1, '00');

      await expect(done).rejects.toMatchObject({ code: 'MalformedFrame' });
    });

    it('reports transport errors with their cause', async () => {
      const { transport, session } = setup();
      const done = session.run();
      transport.reply(ACK_SEQ_1);
      await vi.waitFor(() => expect(session.awaitingAck).toBe(false));

      const cause = new Error('link lost');
      transport.destroy(cause);

      const err = await done.catch((e: unknown) => e);
      expect(err).toBeInstanceOf(SessionError);
      expect(err).toMatchObject({ code: 'TransportError', cause });
    });
  });

  describe('shutdown', () => {
    it('closes both channels when stopped', async () => {
      const { transport, session } = setup();
      const done = session.run();
      transport.reply(ACK_SEQ_1);
      await vi.waitFor(() => expect(session.awaitingAck).toBe(false));

      session.stop();
      await done;

      expect(session.payloads.isClosed).toBe(true);
      expect(session.send({ kind: 'GetCodec' })).toBe(false);
    });

    it('ends when the payload consumer goes away', async () => {
      const { transport, session } = setup();
      const done = session.run();
      session.payloads.close();

      transport.reply(ACK_SEQ_1, INIT_REPLY);

      await expect(done).resolves.toBeUndefined();
    });

    it('can only run once', async () => {
      const { session } = setup();
      const done = session.run();
      await expect(session.run()).rejects.toThrow('Session is already running');
      session.stop();
      await done;
    });
  });
});
