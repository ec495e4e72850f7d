/**
 * StreamStateAggregator Tests
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { AggregatorFinalizedError, ValidationError } from '@deadline-lens/shared';
import { StreamStateAggregator } from './stream-state-aggregator.js';
import type { StreamEvent } from '../ingestion/types.js';

describe('StreamStateAggregator', () => {
  let aggregator: StreamStateAggregator;

  beforeEach(() => {
    aggregator = new StreamStateAggregator();
  });

  describe('deadlineSet()', () => {
    it('should create the record on first mention', () => {
      aggregator.deadlineSet(4, 100, true, 1000);

      expect(aggregator.getRecord(4)).toEqual({
        streamId: 4,
        deadlineMs: 100,
        isHard: true,
        setTime: 1000,
        completed: false,
        bytesDropped: 0,
        blockedEvents: 0,
      });
      expect(aggregator.streamCount).toBe(1);
    });

    it('should be idempotent for identical values', () => {
      aggregator.deadlineSet(4, 100, true, 1000);
      aggregator.deadlineSet(4, 100, true, 1000);

      expect(aggregator.getRecord(4)?.deadlineMs).toBe(100);
      expect(aggregator.finalize().overwrittenDeadlines).toBe(0);
    });

    it('should overwrite with later values and count the overwrite', () => {
      aggregator.deadlineSet(4, 100, true, 1000);
      aggregator.deadlineSet(4, 300, false, 2000);

      const record = aggregator.getRecord(4);
      expect(record?.deadlineMs).toBe(300);
      expect(record?.isHard).toBe(false);
      expect(record?.setTime).toBe(2000);
      expect(aggregator.finalize().overwrittenDeadlines).toBe(1);
    });

    it('should reject negative stream ids', () => {
      expect(() => aggregator.deadlineSet(-1, 100, true, 0)).toThrow(ValidationError);
      expect(aggregator.streamCount).toBe(0);
    });
  });

  describe('drop()', () => {
    it('should accumulate bytes and append one gap per drop', () => {
      aggregator.drop(7, 100, 1000);
      aggregator.drop(7, 200, 2000);
      aggregator.drop(7, 50, 3000);

      const snapshot = aggregator.finalize();
      expect(snapshot.records.get(7)?.bytesDropped).toBe(350);
      expect(snapshot.gaps).toEqual([
        { streamId: 7, bytesDropped: 100, time: 1000 },
        { streamId: 7, bytesDropped: 200, time: 2000 },
        { streamId: 7, bytesDropped: 50, time: 3000 },
      ]);
    });

    it('should reject negative byte counts', () => {
      expect(() => aggregator.drop(7, -5, 0)).toThrow(ValidationError);
      expect(aggregator.getRecord(7)).toBeUndefined();
    });
  });

  describe('completed() and streamBlocked()', () => {
    it('should mark completion with its time', () => {
      aggregator.completed(2, 5000);

      expect(aggregator.getRecord(2)).toMatchObject({ completed: true, completionTime: 5000 });
    });

    it('should count blocked events', () => {
      aggregator.streamBlocked(3);
      aggregator.streamBlocked(3);

      expect(aggregator.getRecord(3)?.blockedEvents).toBe(2);
    });
  });

  describe('deadlineTrace()', () => {
    it('should retain the event without touching records', () => {
      aggregator.deadlineTrace({ time: 10, type: 'deadline_set', rawPayload: { type: 'deadline_set' } });

      const snapshot = aggregator.finalize();
      expect(snapshot.records.size).toBe(0);
      expect(snapshot.deadlineTraces).toEqual([
        { time: 10, type: 'deadline_set', rawPayload: { type: 'deadline_set' } },
      ]);
    });
  });

  describe('applyAll()', () => {
    it('should give the same records regardless of non-additive order', () => {
      const events: StreamEvent[] = [
        { kind: 'deadline_set', streamId: 1, deadlineMs: 100, isHard: true, time: 1000 },
        { kind: 'completed', streamId: 1, time: 1080 },
        { kind: 'drop', streamId: 1, bytes: 20, time: 1050 },
      ];
      const reversed = new StreamStateAggregator();

      expect(aggregator.applyAll(events)).toBe(3);
      reversed.applyAll([...events].reverse());

      expect(reversed.getRecord(1)).toEqual(aggregator.getRecord(1));
    });

    it('should give the same records when two streams interleave differently', () => {
      const setOne: StreamEvent = { kind: 'deadline_set', streamId: 1, deadlineMs: 100, isHard: true, time: 1000 };
      const dropOne: StreamEvent = { kind: 'drop', streamId: 1, bytes: 20, time: 1050 };
      const doneOne: StreamEvent = { kind: 'completed', streamId: 1, time: 1080 };
      const setTwo: StreamEvent = { kind: 'deadline_set', streamId: 2, deadlineMs: 40, isHard: false, time: 1010 };
      const blockTwo: StreamEvent = { kind: 'stream_blocked', streamId: 2 };
      const dropTwo: StreamEvent = { kind: 'drop', streamId: 2, bytes: 7, time: 1030 };
      const doneTwo: StreamEvent = { kind: 'completed', streamId: 2, time: 1060 };
      const streamsFirst = new StreamStateAggregator();
      const shuffled = new StreamStateAggregator();

      aggregator.applyAll([setOne, dropOne, doneOne, setTwo, blockTwo, dropTwo, doneTwo]);
      streamsFirst.applyAll([doneTwo, dropTwo, blockTwo, setTwo, doneOne, dropOne, setOne]);
      shuffled.applyAll([blockTwo, doneOne, setTwo, dropOne, doneTwo, setOne, dropTwo]);

      const expected = aggregator.finalize().records;
      expect(streamsFirst.finalize().records).toEqual(expected);
      expect(shuffled.finalize().records).toEqual(expected);
      expect(expected.get(2)).toEqual({
        streamId: 2,
        deadlineMs: 40,
        isHard: false,
        setTime: 1010,
        bytesDropped: 7,
        blockedEvents: 1,
        completed: true,
        completionTime: 1060,
      });
    });

    it('should dispatch stream_blocked and deadline_trace events', () => {
      aggregator.applyAll([
        { kind: 'stream_blocked', streamId: 5 },
        { kind: 'deadline_trace', event: { time: 1, type: 'deadline_hit', rawPayload: {} } },
      ]);

      const snapshot = aggregator.finalize();
      expect(snapshot.records.get(5)?.blockedEvents).toBe(1);
      expect(snapshot.deadlineTraces).toHaveLength(1);
    });
  });

  describe('finalize()', () => {
    it('should return the same snapshot on repeated calls', () => {
      aggregator.completed(1, 0);

      const first = aggregator.finalize();
      expect(aggregator.finalize()).toBe(first);
      expect(aggregator.isFinalized).toBe(true);
    });

    it('should reject every mutation afterwards', () => {
      aggregator.finalize();

      expect(() => aggregator.deadlineSet(1, 100, true, 0)).toThrow(AggregatorFinalizedError);
      expect(() => aggregator.drop(1, 10, 0)).toThrow(AggregatorFinalizedError);
      expect(() => aggregator.drop(1, -5, 0)).toThrow(AggregatorFinalizedError);
      expect(() => aggregator.completed(1, 0)).toThrow(AggregatorFinalizedError);
      expect(() => aggregator.streamBlocked(1)).toThrow(AggregatorFinalizedError);
      expect(() => aggregator.deadlineTrace({ time: 0, type: 'deadline', rawPayload: {} })).toThrow(
        'Cannot apply deadlineTrace: aggregator already finalized'
      );
    });

    it('should freeze records', () => {
      aggregator.completed(1, 0);

      const record = aggregator.finalize().records.get(1);
      expect(Object.isFrozen(record)).toBe(true);
    });
  });
});
