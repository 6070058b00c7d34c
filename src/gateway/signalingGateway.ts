/**
 * Signaling Gateway
 * WebSocket endpoint for the signaling channel: /ws/vkyc/:sessionId?role=user|agent
 *
 * Users authenticate with the session's link token; agents present an agent id, and the first
 * agent id seen for a session is the only one allowed back in.
 * Sockets that stop answering pings are terminated, which detaches the peer.
 */

import { IncomingMessage, Server } from 'http';
import { Duplex } from 'stream';
import { RawData, WebSocket, WebSocketServer } from 'ws';
import { ChannelError, ErrorCode, errorMessage } from '../errors/vkycErrors';
import { SignalingChannel } from '../services/signalingChannel';
import { PeerConnection, PeerRole } from '../types/signaling.types';
import { VkycEngine } from '../vkycEngine';

const CHANNEL_PATH = /^\/ws\/vkyc\/([A-Za-z0-9_-]+)\/?$/;

export interface SignalingGateway {
  wss: WebSocketServer;
  close(): Promise<void>;
}

interface UpgradeTarget {
  channel: SignalingChannel;
  role: PeerRole;
}

class UpgradeRejection extends Error {
  constructor(readonly status: number, readonly reason: string) {
    super(reason);
  }
}

function rejectUpgrade(socket: Duplex, status: number, reason: string): void {
  socket.once('finish', () => socket.destroy());
  socket.end(`HTTP/1.1 ${status} ${reason}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
}

export function attachSignalingGateway(server: Server, engine: VkycEngine): SignalingGateway {
  const wss = new WebSocketServer({ noServer: true, maxPayload: engine.config.maxFrameBytes * 2 });
  const alive: WeakMap<WebSocket, boolean> = new WeakMap();

  async function authorize(req: IncomingMessage): Promise<UpgradeTarget> {
    const url = new URL(req.url ?? '', 'http://localhost');
    const match = CHANNEL_PATH.exec(url.pathname);
    if (!match) {
      throw new UpgradeRejection(404, 'Not Found');
    }

    const sessionId = match[1];
    const role = url.searchParams.get('role');
    if (role !== 'user' && role !== 'agent') {
      throw new UpgradeRejection(400, 'Bad Request');
    }

    const session = await engine.sessions.getSession(sessionId);
    if (!session) {
      throw new UpgradeRejection(404, 'Not Found');
    }

    if (role === 'user' && url.searchParams.get('token') !== session.linkToken) {
      throw new UpgradeRejection(401, 'Unauthorized');
    }
    const agentId = url.searchParams.get('agentId');
    if (role === 'agent' && !agentId) {
      throw new UpgradeRejection(401, 'Unauthorized');
    }

    const channel = engine.hub.get(sessionId);
    if (!channel) {
      throw new UpgradeRejection(409, 'Conflict');
    }

    if (role === 'agent' && agentId) {
      try {
        channel.bindAgent(agentId);
      } catch (error) {
        if (error instanceof ChannelError && error.code === ErrorCode.PeerUnauthorized) {
          throw new UpgradeRejection(409, 'Conflict');
        }
        throw error;
      }
    }
    return { channel, role };
  }

  function bind(ws: WebSocket, { channel, role }: UpgradeTarget): void {
    const connection: PeerConnection = {
      send: message => {
        if (ws.readyState !== WebSocket.OPEN) {
          throw new Error('Socket is not open');
        }
        ws.send(JSON.stringify(message));
      },
      close: (code, reason) => ws.close(code, reason),
    };

    alive.set(ws, true);
    ws.on('pong', () => alive.set(ws, true));

    ws.on('message', (data: RawData, isBinary: boolean) => {
      if (isBinary) {
        connection.send({ type: 'error', code: 'channel_malformed_message', message: 'Binary frames are not accepted' });
        return;
      }
      channel.receive(role, data.toString()).catch(error => {
        console.error(`[SignalingGateway] Message handling failed for session ${channel.sessionId}:`, error);
      });
    });

    ws.on('close', () => channel.detach(role, connection));
    ws.on('error', error => {
      console.warn(`[SignalingGateway] Socket error for ${role} in session ${channel.sessionId}: ${error.message}`);
    });

    try {
      channel.attach(role, connection);
    } catch (error) {
      console.warn(`[SignalingGateway] Attach refused: ${errorMessage(error)}`);
      ws.close(4409, 'Channel closed');
    }
  }

  server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    authorize(req)
      .then(target => {
        wss.handleUpgrade(req, socket, head, ws => {
          wss.emit('connection', ws, req);
          bind(ws, target);
        });
      })
      .catch(error => {
        if (error instanceof UpgradeRejection) {
          rejectUpgrade(socket, error.status, error.reason);
        } else {
          console.error('[SignalingGateway] Upgrade failed:', error);
          rejectUpgrade(socket, 500, 'Internal Server Error');
        }
      });
  });

  // Dead sockets are dropped; the channel grace period covers reconnection
  const heartbeat = setInterval(() => {
    for (const ws of wss.clients) {
      if (alive.get(ws) === false) {
        ws.terminate();
        continue;
      }
      alive.set(ws, false);
      ws.ping();
    }
  }, engine.config.heartbeatIntervalMs);
  heartbeat.unref();

  console.log('[SignalingGateway] Listening for upgrades on /ws/vkyc/:sessionId');

  return {
    wss,
    close: () => new Promise((resolve, reject) => {
      clearInterval(heartbeat);
      for (const ws of wss.clients) {
        ws.terminate();
      }
      wss.close(error => (error ? reject(error) : resolve()));
    }),
  };
}
