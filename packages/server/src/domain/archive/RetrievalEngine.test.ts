import { describe, it, expect, beforeEach } from 'vitest';
import { StorageAccessError } from '@framevault/common-types';
import { RetrievalEngine, selectSegment } from './RetrievalEngine.js';
import { InMemorySegmentRepository, RecordingEventPublisher } from '../__tests__/test-doubles.js';

const STREAM = 'cam-1';

describe('selectSegment', () => {
  it('picks the latest segment starting at or before the target', () => {
    const segments = [
      { segmentStart: 60000, fileName: 'b' },
      { segmentStart: 0, fileName: 'a' },
      { segmentStart: 120000, fileName: 'c' },
    ];

    expect(selectSegment(segments, 60000)?.fileName).toBe('b');
    expect(selectSegment(segments, 119999)?.fileName).toBe('b');
    expect(selectSegment(segments, 500000)?.fileName).toBe('c');
  });

  it('returns null when every segment starts after the target', () => {
    expect(selectSegment([{ segmentStart: 10, fileName: 'a' }], 9)).toBeNull();
    expect(selectSegment([], 9)).toBeNull();
  });
});

describe('RetrievalEngine', () => {
  let repository: InMemorySegmentRepository;
  let publisher: RecordingEventPublisher;
  let engine: RetrievalEngine;

  beforeEach(() => {
    repository = new InMemorySegmentRepository();
    publisher = new RecordingEventPublisher();
    engine = new RetrievalEngine(repository, publisher);
  });

  describe('with frames at 5, 15 and 25', () => {
    beforeEach(() => {
      repository.seedSegment(STREAM, 5, ['5.jpg', '15.jpg', '25.jpg']);
    });

    it('returns the latest frame at or before the target', async () => {
      const result = await engine.findFrame(STREAM, 20);

      expect(result).toEqual({
        found: true,
        timestamp: 15,
        segmentStart: 5,
        data: Buffer.from('payload:15.jpg'),
      });
    });

    it('returns an exact match', async () => {
      const result = await engine.findFrame(STREAM, 25);
      expect(result.found && result.timestamp).toBe(25);
    });

    it('returns the last frame for targets past the end', async () => {
      const result = await engine.findFrame(STREAM, 1000);
      expect(result.found && result.timestamp).toBe(25);
    });

    it('finds nothing before the first segment', async () => {
      expect(await engine.findFrame(STREAM, 4)).toEqual({ found: false, reason: 'no-segment' });
    });
  });

  it('does not fall back to the previous segment', async () => {
    repository.seedSegment(STREAM, 0, ['59000.jpg']);
    repository.seedSegment(STREAM, 60000, ['60500.jpg']);

    expect(await engine.findFrame(STREAM, 60200)).toEqual({ found: false, reason: 'no-frame' });

    const earlier = await engine.findFrame(STREAM, 59500);
    expect(earlier.found && [earlier.segmentStart, earlier.timestamp]).toEqual([0, 59000]);
  });

  it('starts each lookup without the previous candidate', async () => {
    repository.seedSegment(STREAM, 0, ['59000.jpg']);
    repository.seedSegment(STREAM, 60000, ['60500.jpg']);

    const hit = await engine.findFrame(STREAM, 59500);
    expect(hit.found && hit.timestamp).toBe(59000);

    expect(await engine.findFrame(STREAM, 60200)).toEqual({ found: false, reason: 'no-frame' });
  });

  it('stops scanning at the first frame after the target', async () => {
    repository.seedSegment(STREAM, 10, ['10.jpg', '20.jpg', '30.jpg', '40.jpg']);

    const result = await engine.findFrame(STREAM, 25);

    expect(result.found && result.timestamp).toBe(20);
    expect(repository.visitedNames).toEqual(['10.jpg', '20.jpg', '30.jpg']);
    expect(repository.readNames).toEqual(['10.jpg', '20.jpg']);
  });

  it('skips entries whose names are not timestamps', async () => {
    repository.seedSegment(STREAM, 10, ['10.jpg', 'thumb.jpg', '20.jpg']);

    const result = await engine.findFrame(STREAM, 30);

    expect(result.found && result.timestamp).toBe(20);
    expect(publisher.ofType('unreadable-entry').map((e) => [e.segmentStart, e.entryName])).toEqual([
      [10, 'thumb.jpg'],
    ]);
  });

  it('finds nothing for an unknown stream', async () => {
    expect(await engine.findFrame('unknown', 100)).toEqual({ found: false, reason: 'no-segment' });
  });

  it('propagates storage errors', async () => {
    repository.seedSegment(STREAM, 0, ['0.jpg']);
    repository.scanError = new StorageAccessError('disk unavailable');

    await expect(engine.findFrame(STREAM, 10)).rejects.toThrow(StorageAccessError);
  });
});
