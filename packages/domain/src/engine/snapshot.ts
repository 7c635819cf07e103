import type { PlayerView, RacePlayer } from '../types/player.js';
import type { RaceSnapshot, RaceState } from '../types/race.js';
import { getRacePlayers, isEveryoneFinished } from './race.js';

export function toPlayerView(player: RacePlayer): PlayerView {
  return {
    x: player.x,
    y: player.y,
    name: player.name,
    color: player.color,
    finished: player.finished,
    finishRank: player.finishRank,
    finishTime: player.finishTime,
  };
}

export function buildRaceSnapshot(state: RaceState): RaceSnapshot {
  return {
    allFinished: isEveryoneFinished(state),
    gameOver: state.gameOver,
    players: getRacePlayers(state).map(toPlayerView),
  };
}
