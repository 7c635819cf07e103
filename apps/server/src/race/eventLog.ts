import type { EngineEvent, RaceEvent } from "@maze-race/domain";
import { logger } from "../observability/logger.js";
import {
  trackPlayerFinished,
  trackRaceCompleted,
  trackRaceReset,
} from "../observability/metrics.js";

const DEFAULT_CAPACITY = 1000;

const eventLogger = logger.child({ context: { component: "event-log" } });

/** Sequentially numbered record of the latest race events. */
export class RaceEventLog {
  private entries: RaceEvent[] = [];
  private nextIndex = 0;

  constructor(private readonly capacity = DEFAULT_CAPACITY) {}

  get size() {
    return this.entries.length;
  }

  recent(limit = this.capacity): RaceEvent[] {
    return this.entries.slice(-limit);
  }

  record(round: number, events: EngineEvent[], timestamp = Date.now()): RaceEvent[] {
    const recorded: RaceEvent[] = [];
    for (const entry of events) {
      const stamped: RaceEvent = {
        ...entry,
        eventIndex: this.nextIndex,
        round,
        timestamp,
      };
      this.nextIndex += 1;
      this.entries.push(stamped);
      recorded.push(stamped);
      describeEvent(stamped);
    }

    const overflow = this.entries.length - this.capacity;
    if (overflow > 0) {
      this.entries.splice(0, overflow);
    }

    return recorded;
  }
}

function describeEvent(entry: RaceEvent) {
  const meta = { round: entry.round, eventIndex: entry.eventIndex };
  switch (entry.type) {
    case "PLAYER_FINISHED":
      trackPlayerFinished({ finishRank: entry.payload.finishRank });
      eventLogger.info("player finished", {
        ...meta,
        playerId: entry.payload.sessionId,
        context: {
          name: entry.payload.name,
          finishRank: entry.payload.finishRank,
          finishTime: entry.payload.finishTime,
        },
      });
      break;
    case "RACE_COMPLETED":
      trackRaceCompleted({ playerCount: entry.payload.playerCount });
      eventLogger.info("race completed: all players reached the goal", {
        ...meta,
        context: { playerCount: entry.payload.playerCount },
      });
      break;
    case "RACE_RESET":
      trackRaceReset();
      eventLogger.info("race reset", {
        ...meta,
        context: {
          width: entry.payload.maze.width,
          height: entry.payload.maze.height,
          seed: entry.payload.maze.seed,
          playerCount: entry.payload.playerCount,
        },
      });
      break;
    default:
      // Joins and departures are logged by the session that caused them.
      break;
  }
}
