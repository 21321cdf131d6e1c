import { describe, it, expect } from 'vitest';
import { InternalSelectionError } from '../errors/index';
import { SelectionGraph } from '../graph-index/index';
import { GraphQueue } from './index';

/**
 *   a -> b -> c -> d
 *        b -> e
 *   f -> e
 */
function createQueue(): GraphQueue {
  const graph = SelectionGraph.fromEdges(
    ['a', 'b', 'c', 'd', 'e', 'f'],
    [
      ['a', 'b'],
      ['b', 'c'],
      ['c', 'd'],
      ['b', 'e'],
      ['f', 'e'],
    ],
  );
  return new GraphQueue(graph, graph.nodes());
}

describe('GraphQueue', () => {
  it('orders by descendant count, then by id', () => {
    expect(createQueue().order()).toEqual(['a', 'b', 'c', 'f', 'd', 'e']);
  });

  it('releases a node only after every parent is done', () => {
    const queue = createQueue();

    expect(queue.get()).toBe('a');
    expect(queue.get()).toBe('f');
    expect(queue.empty()).toBe(true);
    expect(queue.get()).toBeUndefined();
    expect(queue.inProgress).toEqual(new Set(['a', 'f']));

    queue.markDone('f');
    expect(queue.empty()).toBe(true);

    queue.markDone('a');
    expect(queue.get()).toBe('b');
    expect(queue.size).toBe(4);
  });

  it('finishes once every node is done', () => {
    const queue = createQueue();
    for (let next = queue.get(); next !== undefined; next = queue.get()) {
      queue.markDone(next);
    }

    expect(queue.isFinished()).toBe(true);
    expect(queue.size).toBe(0);
  });

  it('leaves its own state untouched when computing the order', () => {
    const queue = createQueue();
    queue.order();

    expect(queue.size).toBe(6);
    expect(queue.get()).toBe('a');
  });

  it('rejects completing a node that was never started', () => {
    expect(() => createQueue().markDone('b')).toThrow(InternalSelectionError);
  });
});
