import type { Attributes } from '@opentelemetry/api';
import { getMeter } from './telemetry.js';

const meter = getMeter();

const httpRequestDuration = meter.createHistogram('http_request_duration_ms', {
  description: 'Latency for handled HTTP requests',
  unit: 'ms',
});

const wsConnections = meter.createUpDownCounter('ws_connections_active', {
  description: 'Open WebSocket connections',
});

const wsMessages = meter.createCounter('ws_messages_total', {
  description: 'WebSocket messages received from clients',
});

const playersFinished = meter.createCounter('players_finished_total', {
  description: 'Players that reached the goal',
});

const racesCompleted = meter.createCounter('races_completed_total', {
  description: 'Rounds in which every connected player finished',
});

const raceResets = meter.createCounter('race_resets_total', {
  description: 'Rounds started through a reset',
});

export function recordHttpRequest(
  method: string,
  route: string,
  statusCode: number,
  durationMs: number,
  attributes: Attributes = {},
) {
  httpRequestDuration.record(durationMs, {
    method,
    route,
    statusCode,
    ...attributes,
  });
}

export function trackWsConnection() {
  wsConnections.add(1);
}

export function trackWsDisconnection() {
  wsConnections.add(-1);
}

export function trackWsMessage(options: { type: 'UPDATE' | 'INVALID' }) {
  wsMessages.add(1, { type: options.type });
}

export function trackPlayerFinished(options: { finishRank: number }) {
  playersFinished.add(1, { podium: options.finishRank <= 3 });
}

export function trackRaceCompleted(options: { playerCount: number }) {
  racesCompleted.add(1, { solo: options.playerCount === 1 });
}

export function trackRaceReset() {
  raceResets.add(1);
}
