import { randomUUID } from "node:crypto";
import type { IncomingMessage, Server as HttpServer } from "node:http";
import type { Duplex } from "node:stream";
import { URL } from "node:url";
import { WebSocketServer, WebSocket } from "ws";
import type { RawData } from "ws";
import {
  context as otelContext,
  SpanStatusCode,
  trace,
} from "@opentelemetry/api";
import { EngineError, type SessionId } from "@maze-race/domain";
import type { RaceCoordinator } from "../race/RaceCoordinator.js";
import { encodeServerMessage, parseClientMessage } from "./messages.js";
import { getTracer } from "../observability/telemetry.js";
import { logger } from "../observability/logger.js";
import {
  trackWsConnection,
  trackWsDisconnection,
  trackWsMessage,
} from "../observability/metrics.js";

interface GatewayOptions {
  coordinator: RaceCoordinator;
  path?: string;
}

interface Session {
  sessionId: SessionId;
  socket: WebSocket;
  remoteAddress: string;
  connectedAt: number;
  closed: boolean;
}

interface SessionEnd {
  cause: "client_closed" | "transport_error" | "decode_error" | "shutdown";
  code?: number;
  reason?: string;
}

const DEFAULT_PATH = "/ws";
const CLEAN_CLOSE_CODES = new Set([1000, 1001, 1005]);
const INVALID_PAYLOAD_CODE = 1007;
const GOING_AWAY_CODE = 1001;

const tracer = getTracer();
const wsLogger = logger.child({ context: { component: "ws-gateway" } });

/**
 * Runs one session per WebSocket: registers the player on connect, applies each
 * reported update, and pushes the full race snapshot to every client after every
 * change, including resets triggered elsewhere.
 */
export class WebSocketGateway {
  private readonly coordinator: RaceCoordinator;
  private readonly path: string;
  private readonly wss: WebSocketServer;
  private readonly sessions = new Map<SessionId, Session>();
  private readonly handleRaceReset = () => {
    this.broadcastState();
  };

  constructor(server: HttpServer, options: GatewayOptions) {
    this.coordinator = options.coordinator;
    this.path = options.path ?? DEFAULT_PATH;
    this.wss = new WebSocketServer({ noServer: true });

    server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(req, socket, head);
    });

    this.wss.on(
      "connection",
      (socket: WebSocket, request: IncomingMessage) => {
        this.handleConnection(socket, request.socket.remoteAddress ?? "unknown");
      }
    );

    this.coordinator.on("raceReset", this.handleRaceReset);
  }

  get sessionCount() {
    return this.sessions.size;
  }

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer) {
    const parsedUrl = this.parseRequestUrl(req);
    if (parsedUrl.pathname !== this.path) {
      wsLogger.warn("Invalid upgrade path", {
        context: { path: parsedUrl.pathname },
      });
      this.rejectUpgrade(socket, 404, "Not Found");
      return;
    }

    this.wss.handleUpgrade(req, socket, head, (ws) => {
      this.wss.emit("connection", ws, req);
    });
  }

  protected handleConnection(socket: WebSocket, remoteAddress: string) {
    const session: Session = {
      sessionId: randomUUID(),
      socket,
      remoteAddress,
      connectedAt: Date.now(),
      closed: false,
    };

    this.coordinator.register(session.sessionId);
    this.sessions.set(session.sessionId, session);
    trackWsConnection();
    wsLogger.info("ws connected", {
      playerId: session.sessionId,
      context: { remoteAddress, players: this.coordinator.playerCount },
    });

    socket.on("message", (data: RawData) => this.handleMessage(session, data));
    socket.on("close", (code: number, reason: Buffer) => {
      this.endSession(session, {
        cause: "client_closed",
        code,
        reason: reason && reason.length > 0 ? reason.toString("utf8") : undefined,
      });
    });
    socket.on("error", (error: Error) => {
      wsLogger.warn("ws transport error", {
        playerId: session.sessionId,
        context: { remoteAddress },
        error,
      });
      this.endSession(session, { cause: "transport_error" });
    });

    this.broadcastState();
  }

  private handleMessage(session: Session, raw: RawData) {
    if (session.closed) {
      return;
    }

    const span = tracer.startSpan("ws.message", {
      attributes: { "session.id": session.sessionId },
    });
    otelContext.with(trace.setSpan(otelContext.active(), span), () => {
      let thrown: unknown;
      try {
        const update = parseClientMessage(raw);
        trackWsMessage({ type: update ? "UPDATE" : "INVALID" });
        span.setAttribute("ws.message.valid", update !== null);
        if (!update) {
          wsLogger.warn("malformed client message, closing session", {
            playerId: session.sessionId,
            context: { remoteAddress: session.remoteAddress },
          });
          this.endSession(session, {
            cause: "decode_error",
            code: INVALID_PAYLOAD_CODE,
            reason: "Invalid payload",
          });
          return;
        }

        this.coordinator.update(session.sessionId, update);
        this.broadcastState();
      } catch (error) {
        thrown = error;
        this.handleUpdateError(session, error);
      } finally {
        if (thrown instanceof Error) {
          span.setStatus({ code: SpanStatusCode.ERROR, message: thrown.message });
          span.recordException(thrown);
        }
        span.end();
      }
    });
  }

  private handleUpdateError(session: Session, error: unknown) {
    if (error instanceof EngineError) {
      wsLogger.warn("client update rejected", {
        playerId: session.sessionId,
        context: { code: error.code },
        error,
      });
      return;
    }
    wsLogger.error("unhandled update error", {
      playerId: session.sessionId,
      error,
    });
  }

  /** Idempotent: the first cause to arrive tears the session down. */
  private endSession(session: Session, end: SessionEnd) {
    if (session.closed) {
      return;
    }
    session.closed = true;

    const name = this.coordinator.getPlayerName(session.sessionId);
    this.sessions.delete(session.sessionId);
    this.coordinator.unregister(session.sessionId);
    this.closeTransport(session, end);
    trackWsDisconnection();
    this.broadcastState();

    const meta = {
      playerId: session.sessionId,
      context: {
        name,
        cause: end.cause,
        code: end.code,
        reason: end.reason,
        remoteAddress: session.remoteAddress,
        durationMs: Date.now() - session.connectedAt,
      },
    };
    if (end.cause === "client_closed" && end.code !== undefined && !CLEAN_CLOSE_CODES.has(end.code)) {
      wsLogger.warn("ws disconnected abnormally", meta);
    } else {
      wsLogger.info("ws disconnected", meta);
    }
  }

  private closeTransport(session: Session, end: SessionEnd) {
    const { socket } = session;
    if (socket.readyState !== WebSocket.OPEN) {
      return;
    }
    if (end.cause === "transport_error") {
      socket.terminate();
      return;
    }
    if (end.cause !== "client_closed") {
      socket.close(end.code ?? GOING_AWAY_CODE, end.reason);
    }
  }

  broadcastState() {
    const payload = encodeServerMessage(this.coordinator.snapshot());
    for (const session of this.sessions.values()) {
      this.deliver(session, payload);
    }
  }

  private deliver(session: Session, payload: string) {
    const { socket } = session;
    if (socket.readyState !== WebSocket.OPEN) {
      return;
    }
    // A failed send never stops delivery to the others; the session's own close
    // handling reaps the connection.
    try {
      socket.send(payload, (error?: Error) => {
        if (error) {
          wsLogger.debug("broadcast send failed", {
            playerId: session.sessionId,
            error,
          });
        }
      });
    } catch (error) {
      wsLogger.debug("broadcast send failed", {
        playerId: session.sessionId,
        error,
      });
    }
  }

  shutdown() {
    this.coordinator.off("raceReset", this.handleRaceReset);
    for (const session of [...this.sessions.values()]) {
      this.endSession(session, {
        cause: "shutdown",
        code: GOING_AWAY_CODE,
        reason: "Server shutting down",
      });
    }
    this.wss.close();
  }

  private parseRequestUrl(req: IncomingMessage) {
    const origin = `http://${req.headers.host ?? "localhost"}`;
    return new URL(req.url ?? "/", origin);
  }

  private rejectUpgrade(socket: Duplex, status: number, message: string) {
    socket.once("finish", () => socket.destroy());
    socket.end(
      `HTTP/1.1 ${status} ${message}\r\n` +
        "Connection: close\r\n" +
        "Content-Type: text/plain\r\n" +
        `Content-Length: ${Buffer.byteLength(message)}\r\n` +
        `\r\n${message}`
    );
  }
}
