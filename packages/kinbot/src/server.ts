import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';

import WebSocket, { WebSocketServer, type RawData } from 'ws';

import { componentLogger, errorMessage } from './logger.js';
import type { ServerMessage } from './protocol.js';
import { apiKeyMatches } from './session/auth.js';
import { Session, type SessionDeps } from './session/session.js';
import type { MemoryRepository } from './store/memory.js';
import { encodeVector, type PeopleRepository } from './store/people.js';
import type { ZoneRepository } from './store/zones.js';

const log = componentLogger('server');

export interface RestoreSource {
  people: PeopleRepository;
  zones: ZoneRepository;
  memories: MemoryRepository;
}

export interface StartServerOptions {
  port: number;
  wsPath: string;
  restorePath: string;
  maxPayloadBytes: number;
  apiKey: string;
  sessionDeps: SessionDeps;
}

export interface RestorePayload {
  people: Array<{
    person_id: string;
    name: string;
    first_seen_ms: number;
    last_seen_ms: number;
    interaction_count: number;
    notes: string;
    face_embeddings: Array<{ embedding: string; captured_at_ms: number; source_lighting: string | null }>;
  }>;
  zones: Array<{
    id: number;
    name: string;
    category: string;
    description: string;
    accessible: boolean;
    is_current: boolean;
    paths: Array<{ to_zone_id: number; direction_hint: string; distance_cm: number | null }>;
  }>;
  memories: Array<{ id: number; memory_type: string; content: string; importance: number; created_at_ms: number }>;
}

function rawDataToBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }

  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }

  return Buffer.from(data);
}

function sendJson(ws: WebSocket, payload: ServerMessage): void {
  if (ws.readyState !== WebSocket.OPEN) {
    return;
  }

  ws.send(JSON.stringify(payload));
}

function sendHttpJson(res: ServerResponse, statusCode: number, payload: unknown): void {
  if (res.writableEnded) {
    return;
  }

  res.statusCode = statusCode;
  res.setHeader('content-type', 'application/json');
  res.end(JSON.stringify(payload));
}

function sendHttpError(res: ServerResponse, statusCode: number, code: string, message: string): void {
  sendHttpJson(res, statusCode, { error: { code, message } });
}

function sendServiceOk(res: ServerResponse): void {
  sendHttpJson(res, 200, { service: 'kinbot', status: 'ok' });
}

function headerValue(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/** Everything a client device needs to rebuild its local state after a reinstall. */
export function buildRestorePayload(source: RestoreSource): RestorePayload {
  return {
    people: source.people.listAll().map((person) => ({
      person_id: person.personId,
      name: person.name,
      first_seen_ms: person.firstSeenMs,
      last_seen_ms: person.lastSeenMs,
      interaction_count: person.interactionCount,
      notes: person.notes,
      face_embeddings: source.people.getEmbeddings(person.personId).map((embedding) => ({
        embedding: encodeVector(embedding.vector).toString('base64'),
        captured_at_ms: embedding.capturedAtMs,
        source_lighting: embedding.sourceLighting,
      })),
    })),
    zones: source.zones.listAll().map((zone) => ({
      id: zone.id,
      name: zone.name,
      category: zone.category,
      description: zone.description,
      accessible: zone.accessible,
      is_current: zone.isCurrent,
      paths: source.zones.getPathsFrom(zone.id).map((path) => ({
        to_zone_id: path.toZoneId,
        direction_hint: path.directionHint,
        distance_cm: path.distanceCm,
      })),
    })),
    memories: source.memories.listForScope(null).map((memory) => ({
      id: memory.id,
      memory_type: memory.memoryType,
      content: memory.content,
      importance: memory.importance,
      created_at_ms: memory.createdAtMs,
    })),
  };
}

/** Builds the HTTP + WebSocket server without binding a port. */
export function createKinbotServer(options: Omit<StartServerOptions, 'port'>): Server {
  const { wsPath, restorePath, maxPayloadBytes, apiKey, sessionDeps } = options;

  const handleRestore = (req: IncomingMessage, res: ServerResponse): void => {
    if ((req.method ?? 'GET').toUpperCase() !== 'GET') {
      sendHttpError(res, 405, 'METHOD_NOT_ALLOWED', 'Method not allowed.');
      return;
    }

    if (!apiKeyMatches(headerValue(req, 'x-api-key'), apiKey)) {
      sendHttpError(res, 401, 'INVALID_API_KEY', 'Missing or invalid X-API-Key header.');
      return;
    }

    sendHttpJson(res, 200, buildRestorePayload(sessionDeps));
  };

  const server = createServer((req, res) => {
    const requestUrl = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

    if (requestUrl.pathname === restorePath) {
      try {
        handleRestore(req, res);
      } catch (error) {
        log.error({ err: errorMessage(error) }, 'server: restore request failed');
        sendHttpError(res, 500, 'INTERNAL_ERROR', 'Internal server error.');
      }
      return;
    }

    sendServiceOk(res);
  });

  const wss = new WebSocketServer({ noServer: true, maxPayload: maxPayloadBytes });

  server.on('upgrade', (request, socket, head) => {
    const requestUrl = new URL(request.url ?? '/', `http://${request.headers.host ?? 'localhost'}`);

    if (requestUrl.pathname !== wsPath) {
      socket.destroy();
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      wss.emit('connection', ws, request);
    });
  });

  wss.on('connection', (ws) => {
    const session = new Session(
      {
        send: (message) => {
          sendJson(ws, message);
        },
        close: (code, reason) => {
          ws.close(code, reason);
        },
      },
      sessionDeps,
    );

    session.open();

    ws.on('message', (data, isBinary) => {
      void session.receive(rawDataToBuffer(data), isBinary).catch((error: unknown) => {
        log.error({ sessionId: session.sessionId, err: errorMessage(error) }, 'server: message handling failed');
      });
    });

    ws.on('close', () => {
      session.handleTransportClosed();
    });

    ws.on('error', (error) => {
      log.warn({ sessionId: session.sessionId, err: error.message }, 'server: socket error');
      session.handleTransportClosed();
    });
  });

  server.on('close', () => {
    for (const client of wss.clients) {
      client.terminate();
    }

    wss.close();
  });

  return server;
}

export function startServer(options: StartServerOptions): Server {
  const server = createKinbotServer(options);

  server.listen(options.port, () => {
    log.info(`server: listening on http://localhost:${options.port}`);
    log.info(`server: websocket endpoint ws://localhost:${options.port}${options.wsPath}`);
    log.info(`server: restore endpoint ${options.restorePath}`);
  });

  return server;
}
