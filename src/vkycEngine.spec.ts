import * as fs from 'fs';
import * as path from 'path';
import { RecordingConnection, makeTempDir, removeDir, testConfig, waitFor } from './testUtils/fakes';
import { createStores, createTestEngine as createEngine } from './testUtils/testEngine';
import { VkycEngine } from './vkycEngine';

const FRAME_BASE64 = Buffer.from('document-frame').toString('base64');

async function startCall(engine: VkycEngine) {
  const link = await engine.links.issue('cust-1');
  const created = await engine.sessions.createSession(link.token);
  await engine.sessions.chooseMode(created.sessionId, 'immediate');
  const session = await engine.sessions.beginSession(created.sessionId);

  const channel = engine.hub.require(session.sessionId);
  const user = new RecordingConnection();
  const agent = new RecordingConnection();
  channel.attach('user', user);
  channel.attach('agent', agent);
  return { sessionId: session.sessionId, channel, user, agent };
}

describe('VkycEngine', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir('engine');
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('runs a session from link to completed recording', async () => {
    const config = testConfig(dir);
    const engine = createEngine(config);
    const { sessionId, channel, user, agent } = await startCall(engine);

    expect(engine.transport.push(sessionId, { data: Buffer.from('media'), durationMs: 5000 })).toBe(true);
    await waitFor(() => fs.existsSync(path.join(config.recordingsDir, sessionId, 'chunk-0000.webm')));

    for (const documentType of ['pan', 'aadhaar'] as const) {
      await channel.receive('agent', { type: 'capture_command', documentType });
      await channel.receive('user', { type: 'capture_submission', documentType, image: FRAME_BASE64 });
      await engine.pipeline.drain();
    }
    await channel.receive('user', { type: 'liveness_event', event: { kind: 'blink', count: 2 } });
    await channel.receive('agent', { type: 'liveness_event', event: { kind: 'response', prompt: 'blink', passed: true } });

    const completed = await engine.sessions.completeSession(sessionId);
    const recording = await engine.recordings.finalize(sessionId);

    expect(completed.state).toBe('completed');
    expect(completed.biometricsPassed).toBe(true);
    expect(user.ofType('verification_update').map(message => [message.documentType, message.status])).toEqual([
      ['pan', 'matched'],
      ['aadhaar', 'matched'],
    ]);
    expect(user.ofType('media_control').map(message => message.action)).toEqual(['start_recording', 'stop_recording']);
    expect(user.ofType('session_ended')).toEqual([{ type: 'session_ended', outcome: 'completed' }]);
    expect(agent.closed).toEqual({ code: 1000, reason: 'Session ended' });
    expect(recording).toMatchObject({ state: 'done', location: `/videos/${sessionId}.mp4`, chunkCount: 1 });
    expect(engine.hub.get(sessionId)).toBeUndefined();
    expect(engine.transport.isOpen(sessionId)).toBe(false);

    await waitFor(() => engine.audit.getSessionTimeline(sessionId)?.biometricEvents.length === 1);
    const summaries = engine.audit.getSessionTimeline(sessionId)?.decisions.map(decision => decision.summary);
    expect(summaries).toEqual(expect.arrayContaining([
      'pan: matched',
      'aadhaar: matched',
      'blink: passed',
      'verifying -> completed',
      'Recording done',
    ]));
  });

  it('fails the session as incomplete when the recording cap is reached first', async () => {
    const engine = createEngine(testConfig(dir, { recordingCapMs: 1000 }));
    const { sessionId, user } = await startCall(engine);

    engine.transport.push(sessionId, { data: Buffer.from('media'), durationMs: 1000 });
    await waitFor(() => user.ofType('session_ended').length === 1);

    const session = await engine.sessions.getSession(sessionId);
    expect(session).toMatchObject({
      state: 'failed',
      terminationReason: 'verification_incomplete',
      recordingCapReached: true,
    });
    expect(user.ofType('session_ended')).toEqual([{ type: 'session_ended', outcome: 'verification_failed' }]);
    expect(await engine.recordings.finalize(sessionId)).toMatchObject({ state: 'done', capReached: true });
    const capDecision = engine.audit.getSessionTimeline(sessionId)?.decisions
      .find(decision => decision.summary === 'Recording cap reached');
    expect(capDecision?.details).toEqual({ code: 'timeout_recording_cap_reached' });
  });

  it('tells the remaining peer the call was disconnected when the other leaves', async () => {
    const engine = createEngine(testConfig(dir));
    const { sessionId, channel, agent } = await startCall(engine);

    await channel.receive('user', { type: 'leave' });

    expect((await engine.sessions.getSession(sessionId))?.terminationReason).toBe('user_left');
    expect(agent.ofType('peer_status').pop()).toEqual({ type: 'peer_status', role: 'user', status: 'left' });
    expect(agent.ofType('session_ended')).toEqual([{ type: 'session_ended', outcome: 'disconnected' }]);
    expect(await engine.recordings.finalize(sessionId)).toMatchObject({ state: 'failed', error: 'No media was recorded' });
  });

  it('fails sessions and recordings interrupted by a restart', async () => {
    const stores = createStores();
    const before = createEngine(testConfig(dir), stores);
    const { sessionId } = await startCall(before);
    await waitFor(() => before.recordings.isBuffering(sessionId));

    const after = createEngine(testConfig(dir), stores);
    await after.recover();

    expect(await after.sessions.getSession(sessionId)).toMatchObject({
      state: 'failed',
      terminationReason: 'process_restart',
    });
    expect(await after.recordings.getRecording(sessionId)).toMatchObject({
      state: 'failed',
      error: 'Interrupted by process restart',
    });

    before.hub.closeAll('disconnected');
    before.transport.closeChannel(sessionId);
    await before.recordings.finalize(sessionId);
  });
});
