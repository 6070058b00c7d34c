import { MemorySink } from '../testUtils/fakes';
import { BiometricEvent } from '../types/vkyc.types';
import { BiometricSink } from './auditTrailService';
import { BiometricLogger } from './biometricLogger';

class HangingSink implements BiometricSink {
  calls = 0;

  append(_sessionId: string, _events: BiometricEvent[]): Promise<void> {
    this.calls++;
    return new Promise<void>(() => undefined);
  }
}

describe('BiometricLogger', () => {
  it('forces strictly increasing timestamps within a session', () => {
    const logger = new BiometricLogger(new MemorySink(), { bufferSize: 10, retryMs: 10, now: () => 100 });

    const timestamps = [100, 100, 50].map(timestamp => logger.log('s-1', 'blink', { count: 1 }, timestamp).timestamp);

    expect(timestamps).toEqual([100, 101, 102]);
  });

  it('replaces client timestamps that are unsafe or far from the server clock', () => {
    const logger = new BiometricLogger(new MemorySink(), {
      bufferSize: 10,
      retryMs: 10,
      maxClockSkewMs: 1000,
      now: () => 50_000,
    });

    const timestamps = [1e17, 1e17, 1.5, 10_000, 50_900].map(
      timestamp => logger.log('s-1', 'blink', { count: 1 }, timestamp).timestamp,
    );

    expect(timestamps).toEqual([50_000, 50_001, 50_002, 50_003, 50_900]);
  });

  it('numbers events per session and stamps them with the clock when no timestamp is given', () => {
    const logger = new BiometricLogger(new MemorySink(), { bufferSize: 10, retryMs: 10, now: () => 777 });

    const first = logger.log('s-1', 'ip_sample', { ip: '10.0.0.1' });
    const other = logger.log('s-2', 'ip_sample', { ip: '10.0.0.2' });
    const second = logger.log('s-1', 'geo_sample', { latitude: 1, longitude: 2 });

    expect([first.sequence, other.sequence, second.sequence]).toEqual([1, 1, 2]);
    expect([first.timestamp, other.timestamp, second.timestamp]).toEqual([777, 777, 778]);
  });

  it('drops the oldest event when the buffer is full and keeps the rest in order', async () => {
    const sink = new MemorySink(1);
    const logger = new BiometricLogger(sink, { bufferSize: 2, retryMs: 10 });

    logger.log('s-1', 'blink', { count: 1 }, 1);
    logger.log('s-1', 'blink', { count: 2 }, 2);
    logger.log('s-1', 'blink', { count: 3 }, 3);
    const flushed = await logger.flush('s-1');

    expect(flushed).toBe(true);
    expect(logger.getDroppedCount('s-1')).toBe(1);
    expect(sink.stored.map(event => event.sequence)).toEqual([2, 3]);
  });

  it('never waits on a slow sink', () => {
    const sink = new HangingSink();
    const logger = new BiometricLogger(sink, { bufferSize: 2, retryMs: 10 });

    const sequences = [1, 2, 3].map(count => logger.log('s-1', 'blink', { count }).sequence);

    expect(sequences).toEqual([1, 2, 3]);
    expect(logger.getStats('s-1')).toEqual({ pending: 2, dropped: 1, lastSequence: 3 });
    expect(sink.calls).toBe(1);
  });

  it('retries the sink after a failure', async () => {
    const sink = new MemorySink(1);
    const logger = new BiometricLogger(sink, { bufferSize: 10, retryMs: 5 });

    logger.log('s-1', 'head_pose', { yaw: 1, pitch: 2, roll: 3 }, 10);
    await new Promise(resolve => setTimeout(resolve, 50));

    expect(sink.stored).toHaveLength(1);
    expect(logger.getStats('s-1').pending).toBe(0);
  });

  it('reports and releases events the sink never accepted when the session closes', async () => {
    const sink = new MemorySink(100);
    const logger = new BiometricLogger(sink, { bufferSize: 10, retryMs: 1000 });
    logger.log('s-1', 'blink', { count: 1 });
    logger.log('s-1', 'blink', { count: 2 });

    const stats = await logger.closeSession('s-1');

    expect(stats).toEqual({ pending: 2, dropped: 0, lastSequence: 2 });
    expect(sink.stored).toEqual([]);
    expect(logger.getStats('s-1')).toEqual({ pending: 0, dropped: 0, lastSequence: 0 });
  });

  it('flushes an unknown session trivially', async () => {
    const logger = new BiometricLogger(new MemorySink(), { bufferSize: 10, retryMs: 10 });

    await expect(logger.flush('missing')).resolves.toBe(true);
  });
});
