import http, { type IncomingMessage, type ServerResponse } from "node:http";
import { URL } from "node:url";
import {
  context as otelContext,
  SpanStatusCode,
  trace,
} from "@opentelemetry/api";
import { RaceCoordinator } from "./race/RaceCoordinator.js";
import { getTracer, getMetricsHandler } from "./observability/telemetry.js";
import { recordHttpRequest } from "./observability/metrics.js";
import { logger } from "./observability/logger.js";

export interface RequestContext {
  coordinator: RaceCoordinator;
}

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export interface CreateServerOptions {
  context?: Partial<RequestContext>;
}

type Route = "/maze" | "/info" | "/reset" | "/api/health" | "/api/events";

const ROUTE_METHODS: Record<Route, readonly string[]> = {
  "/maze": ["GET"],
  "/info": ["GET"],
  "/reset": ["GET", "POST"],
  "/api/health": ["GET"],
  "/api/events": ["GET"],
};

const DEFAULT_EVENT_LIMIT = 100;
const MAX_EVENT_LIMIT = 1000;

const tracer = getTracer();
const metricsHandler = getMetricsHandler();
const httpLogger = logger.child({ context: { component: "http-server" } });

export function createAppServer(options: CreateServerOptions = {}) {
  const ctx: RequestContext = {
    coordinator: options.context?.coordinator ?? new RaceCoordinator(),
  };

  return http.createServer(async (req, res) => {
    const startAt = process.hrtime.bigint();
    const method = req.method ?? "GET";
    const parsedUrl = parseRequestUrl(req);
    const span = tracer.startSpan("http.request", {
      attributes: {
        "http.method": method,
        "http.target": parsedUrl.pathname,
      },
    });
    let thrown: unknown;

    await otelContext.with(
      trace.setSpan(otelContext.active(), span),
      async () => {
        try {
          if (method === "GET" && parsedUrl.pathname === "/metrics") {
            await metricsHandler(req, res);
            return;
          }
          handleIncomingRequest(req, res, ctx, parsedUrl);
        } catch (error) {
          thrown = error;
          if (error instanceof HttpError) {
            sendJson(res, error.status, {
              error: error.code,
              message: error.message,
            });
            return;
          }

          httpLogger.error("unhandled http error", {
            error,
            context: { path: parsedUrl.pathname },
          });
          sendJson(res, 500, { error: "INTERNAL_ERROR" });
        }
      }
    );

    if (thrown instanceof Error) {
      span.setStatus({ code: SpanStatusCode.ERROR, message: thrown.message });
      span.recordException(thrown);
    }
    span.setAttribute("http.response.status_code", res.statusCode);
    span.setAttribute("http.route", parsedUrl.pathname);
    span.end();

    const durationMs = Number(process.hrtime.bigint() - startAt) / 1_000_000;
    recordHttpRequest(method, parsedUrl.pathname, res.statusCode, durationMs);
    const logMeta = {
      context: {
        method,
        path: parsedUrl.pathname,
        statusCode: res.statusCode,
        durationMs,
      },
      error: thrown,
    };
    if (thrown && !(thrown instanceof HttpError)) {
      httpLogger.error("http request failed", logMeta);
    } else {
      httpLogger.info("http request handled", logMeta);
    }
  });
}

export function handleIncomingRequest(
  req: IncomingMessage,
  res: ServerResponse,
  ctx: RequestContext,
  parsedUrl = parseRequestUrl(req)
) {
  const method = req.method ?? "GET";
  setCorsHeaders(res);

  if (method === "OPTIONS") {
    res.statusCode = 204;
    res.end();
    return;
  }

  const route = matchRoute(parsedUrl.pathname);
  if (!route) {
    throw new HttpError(404, "NOT_FOUND", `No route for ${parsedUrl.pathname}`);
  }
  if (!ROUTE_METHODS[route].includes(method)) {
    res.setHeader("Allow", [...ROUTE_METHODS[route], "OPTIONS"].join(","));
    throw new HttpError(
      405,
      "METHOD_NOT_ALLOWED",
      `${method} is not allowed on ${route}`
    );
  }

  switch (route) {
    case "/maze":
      sendJson(res, 200, ctx.coordinator.getMazeCells());
      return;
    case "/info":
      sendJson(res, 200, ctx.coordinator.getMazeInfo());
      return;
    case "/reset":
      handleReset(res, ctx);
      return;
    case "/api/health":
      sendJson(res, 200, { ok: true });
      return;
    case "/api/events":
      sendJson(res, 200, {
        round: ctx.coordinator.round,
        events: ctx.coordinator.recentEvents(
          parseLimit(parsedUrl.searchParams.get("limit"))
        ),
      });
      return;
  }
}

function handleReset(res: ServerResponse, ctx: RequestContext) {
  const snapshot = ctx.coordinator.reset();
  httpLogger.info("race reset requested", {
    round: ctx.coordinator.round,
    context: { players: snapshot.players.length },
  });
  sendJson(res, 200, { ok: true });
}

function parseLimit(raw: string | null) {
  if (raw === null || !raw.trim()) {
    return DEFAULT_EVENT_LIMIT;
  }
  const parsed = Number(raw.trim());
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new HttpError(
      400,
      "INVALID_INPUT",
      "limit must be a positive integer"
    );
  }
  return Math.min(parsed, MAX_EVENT_LIMIT);
}

function matchRoute(pathname: string): Route | undefined {
  return isRoute(pathname) ? pathname : undefined;
}

function isRoute(pathname: string): pathname is Route {
  return Object.hasOwn(ROUTE_METHODS, pathname);
}

function parseRequestUrl(req: IncomingMessage) {
  const origin = `http://${req.headers.host ?? "localhost"}`;
  return new URL(req.url ?? "/", origin);
}

function setCorsHeaders(res: ServerResponse) {
  res.setHeader("Access-Control-Allow-Origin", "*");
  res.setHeader("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type");
}

function sendJson(res: ServerResponse, status: number, body: unknown) {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(body));
}
