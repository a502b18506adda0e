/**
 * Tests for result aggregation.
 */

import { describe, it, expect, vi } from 'vitest';
import { ResultAggregator } from '../aggregator/index.js';
import { createContentIdentifier } from '../content/index.js';
import { ChunkProcessingError, NetworkError, ProtocolInvariantError } from '../errors/index.js';

const ids = ['zero', 'one', 'two'].map((text) => createContentIdentifier(Buffer.from(text)));

describe('ResultAggregator', () => {
  it('should restore chunk order', () => {
    const aggregator = new ResultAggregator();

    aggregator.record({ index: 2, identifier: ids[2], deduplicated: false });
    aggregator.record({ index: 0, identifier: ids[0], deduplicated: true });
    aggregator.record({ index: 1, identifier: ids[1], deduplicated: false });

    expect(aggregator.finish(3)).toEqual(ids);
  });

  it('should reject a missing result', () => {
    const aggregator = new ResultAggregator();
    aggregator.record({ index: 0, identifier: ids[0], deduplicated: false });
    aggregator.record({ index: 2, identifier: ids[2], deduplicated: false });

    expect(() => aggregator.finish(3)).toThrow(ProtocolInvariantError);
  });

  it('should reject a duplicated index', () => {
    const aggregator = new ResultAggregator();
    aggregator.record({ index: 0, identifier: ids[0], deduplicated: false });
    aggregator.record({ index: 0, identifier: ids[0], deduplicated: false });
    aggregator.record({ index: 1, identifier: ids[1], deduplicated: false });

    expect(() => aggregator.finish(3)).toThrow('chunk indices are not contiguous at position 1');
  });

  it('should latch the first failure', async () => {
    const onFailure = vi.fn();
    const aggregator = new ResultAggregator({ onFailure });
    const first = new ChunkProcessingError(1, 'probe', new NetworkError('reset'));
    const second = new ChunkProcessingError(2, 'upload', new NetworkError('reset'));

    aggregator.record({ index: 0, identifier: ids[0], deduplicated: false });
    aggregator.record({ index: 1, error: first });
    aggregator.record({ index: 2, error: second });
    aggregator.record({ index: 3, identifier: ids[2], deduplicated: false });

    await expect(aggregator.failure).resolves.toBe(first);
    expect(onFailure).toHaveBeenCalledTimes(1);
    expect(onFailure).toHaveBeenCalledWith(first);
    expect(aggregator.failed).toBe(true);
    expect(aggregator.count).toBe(1);
    expect(() => aggregator.finish(4)).toThrow(first);
  });
});
