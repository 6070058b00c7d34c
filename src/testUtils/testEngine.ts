/**
 * Engine and HTTP server wired with in-process fakes
 */

import http from 'http';
import { createApp } from '../app';
import { VkycConfig } from '../config/vkycConfig';
import { SignalingGateway, attachSignalingGateway } from '../gateway/signalingGateway';
import { AuditTrailService } from '../services/auditTrailService';
import { InMemoryRepository } from '../stores/repository';
import { RecordingRecord, VerificationLink, VkycSession } from '../types/vkyc.types';
import { VkycEngine, createVkycEngine } from '../vkycEngine';
import { FakeCompressor, ScriptedOcr, ScriptedRegistry } from './fakes';

export interface TestStores {
  links: InMemoryRepository<VerificationLink>;
  sessions: InMemoryRepository<VkycSession>;
  recordings: InMemoryRepository<RecordingRecord>;
}

export function createStores(): TestStores {
  return {
    links: new InMemoryRepository<VerificationLink>(),
    sessions: new InMemoryRepository<VkycSession>(),
    recordings: new InMemoryRepository<RecordingRecord>(),
  };
}

export function createTestEngine(config: VkycConfig, stores: TestStores = createStores()): VkycEngine {
  return createVkycEngine(config, {
    ocr: new ScriptedOcr([{ fields: { name: 'TEST USER', idNumber: 'ID-0001' }, confidence: 0.9 }]),
    registry: new ScriptedRegistry(['matched']),
    compressor: new FakeCompressor(),
    audit: new AuditTrailService(),
    linkRepository: stores.links,
    sessionRepository: stores.sessions,
    recordingRepository: stores.recordings,
  });
}

export interface TestServer {
  baseUrl: string;
  wsUrl: string;
  gateway: SignalingGateway;
  close(): Promise<void>;
}

/**
 * Serve the app and the signaling gateway on a loopback port picked by the OS
 */
export async function startTestServer(engine: VkycEngine): Promise<TestServer> {
  const server = http.createServer(createApp(engine));
  const gateway = attachSignalingGateway(server, engine);

  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server is not listening on a TCP port');
  }
  const { port } = address;

  return {
    baseUrl: `http://127.0.0.1:${port}`,
    wsUrl: `ws://127.0.0.1:${port}`,
    gateway,
    close: async () => {
      await gateway.close();
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
    },
  };
}

/**
 * Poll on a timer until the condition holds; for work that crosses real sockets
 */
export async function eventually(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('Condition not met in time');
    }
    await new Promise(resolve => setTimeout(resolve, 5));
  }
}
