import { describe, expect, it } from 'vitest';
import { RaceEventLog } from './eventLog.js';

describe('RaceEventLog', () => {
  it('stamps events with a running index, round and timestamp', () => {
    const log = new RaceEventLog();

    const recorded = log.record(
      3,
      [
        { type: 'PLAYER_JOINED', payload: { sessionId: 'p1' } },
        { type: 'PLAYER_LEFT', payload: { sessionId: 'p1', name: 'Anon', finished: false } },
      ],
      42,
    );

    expect(recorded).toEqual([
      { type: 'PLAYER_JOINED', payload: { sessionId: 'p1' }, eventIndex: 0, round: 3, timestamp: 42 },
      {
        type: 'PLAYER_LEFT',
        payload: { sessionId: 'p1', name: 'Anon', finished: false },
        eventIndex: 1,
        round: 3,
        timestamp: 42,
      },
    ]);
    expect(log.size).toBe(2);
  });

  it('keeps only the newest entries up to capacity', () => {
    const log = new RaceEventLog(2);
    for (const sessionId of ['a', 'b', 'c']) {
      log.record(1, [{ type: 'PLAYER_JOINED', payload: { sessionId } }]);
    }

    expect(log.size).toBe(2);
    expect(log.recent().map((entry) => entry.eventIndex)).toEqual([1, 2]);
    expect(log.recent(1).map((entry) => entry.eventIndex)).toEqual([2]);
  });
});
