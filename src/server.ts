import dotenv from 'dotenv';
import http from 'http';
import { createApp } from './app';
import { loadConfig } from './config/vkycConfig';
import { attachSignalingGateway } from './gateway/signalingGateway';
import { createVkycEngine } from './vkycEngine';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const engine = createVkycEngine(config);
  const app = createApp(engine);

  // HTTP Server
  const server = http.createServer(app);
  const gateway = attachSignalingGateway(server, engine);

  await engine.recover();
  engine.sessions.startScheduler();

  // Start server
  server.listen(config.port, () => {
    console.log(`\n${'='.repeat(60)}`);
    console.log(`✅ VKYC Session Engine running on port ${config.port}`);
    console.log(`${'='.repeat(60)}`);
    console.log(`\n📋 Components:`);
    console.log(`   ✓ Link Issuer & Session State Machine`);
    console.log(`   ✓ Signaling Channel (WebSocket)`);
    console.log(`   ✓ Verification Pipeline (OCR + Registry)`);
    console.log(`   ✓ Biometric Logger & Audit Trail`);
    console.log(`   ✓ Recording Manager (cap ${config.recordingCapMs / 1000}s)`);
    console.log(`\n🌐 Frontend URL: ${config.frontendUrl}`);
    console.log(`📡 API Base URL: http://localhost:${config.port}/vkyc`);
    console.log(`🔌 Signaling: ws://localhost:${config.port}/ws/vkyc/:sessionId`);
    console.log(`\n💡 Health Check: http://localhost:${config.port}/health\n`);
  });

  const shutdown = (signal: string) => {
    console.log(`\n[Server] ${signal} received, shutting down`);
    gateway.close()
      .then(() => engine.shutdown())
      .then(() => server.close(() => process.exit(0)))
      .catch(error => {
        console.error('[Server] Shutdown failed:', error);
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(error => {
  console.error('[Server] Failed to start:', error);
  process.exit(1);
});
