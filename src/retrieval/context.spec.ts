// file: src/retrieval/context.spec.ts
import { describe, expect, it } from 'vitest';
import type { HopRow } from '../db/store';
import { InvalidRequestError } from '../errors';
import { connectedStore, contextFor, names, node } from '../testing/graph_fixtures';
import { getContext, getRelatedNodes, getTopicWithSubtopics, summarizeHops } from './context';

describe('summarizeHops', () => {
  const a = node('a', ['Topic'], { name: 'Anchor' });
  const b = node('b', ['Topic'], { name: 'Beta' });
  const c = node('c', ['Topic'], { name: 'Alpha' });
  const row = (n: typeof a, hops: number, relType: string): HopRow => ({ node: n, hops, relType, weight: null });

  it('keeps each node once at its smallest hop count', () => {
    const res = summarizeHops([row(c, 2, 'USED_IN'), row(b, 1, 'CONTAINS'), row(c, 1, 'PREREQUISITE_FOR')], 'a', 2);
    expect(names(res.nodes)).toEqual(['Alpha', 'Beta']);
    expect(res.relationshipTypes).toEqual(['CONTAINS', 'PREREQUISITE_FOR', 'USED_IN']);
  });

  it('drops the anchor and rows beyond the depth', () => {
    const res = summarizeHops([row(a, 1, 'CONTAINS'), row(b, 3, 'USED_IN')], 'a', 2);
    expect(res).toEqual({ nodes: [], relationshipTypes: [] });
  });
});

describe('getContext', () => {
  it('returns direct neighbours in both directions at depth 1', async () => {
    const ctx = contextFor(await connectedStore('sample'));
    const res = await getContext(ctx, 'Processes', 1);
    expect(res.node?.name).toBe('Processes');
    expect(names(res.connectedNodes)).toEqual([
      'CPU Scheduling',
      'Context Switching',
      'Intermediate',
      'OS Fundamentals',
      'Process Control Block',
      'Threads',
    ]);
    expect(res.relationshipTypes).toEqual(['CONTAINS', 'HAS_SUBTOPIC', 'PREREQUISITE_FOR']);
  });

  it('lists one-hop nodes before two-hop nodes', async () => {
    const ctx = contextFor(await connectedStore('sample'));
    const res = await getContext(ctx, 'Processes', 2);
    expect(names(res.connectedNodes)).toEqual([
      'CPU Scheduling',
      'Context Switching',
      'Intermediate',
      'OS Fundamentals',
      'Process Control Block',
      'Threads',
      'Advanced',
      'Beginner',
      'Memory Management',
      'Round Robin',
      'Synchronization',
    ]);
    expect(res.relationshipTypes).toEqual(['CONTAINS', 'EASIER_THAN', 'HAS_SUBTOPIC', 'PREREQUISITE_FOR', 'USED_IN']);
  });

  it('returns an empty result for an unknown node', async () => {
    const ctx = contextFor(await connectedStore('sample'));
    await expect(getContext(ctx, 'nothing')).resolves.toEqual({ node: null, connectedNodes: [], relationshipTypes: [] });
  });

  it.each([0, 5])('rejects depth %s', async depth => {
    const ctx = contextFor(await connectedStore('sample'));
    await expect(getContext(ctx, 'Processes', depth)).rejects.toBeInstanceOf(InvalidRequestError);
  });
});

describe('getRelatedNodes', () => {
  it('filters by relationship type', async () => {
    const ctx = contextFor(await connectedStore('sample'));
    const res = await getRelatedNodes(ctx, 'Processes', 'HAS_SUBTOPIC');
    expect(names(res.relatedNodes)).toEqual(['Context Switching', 'Process Control Block']);
    expect(res.relationshipTypes).toEqual(['HAS_SUBTOPIC']);
  });

  it('collects every incident relationship without a filter', async () => {
    const ctx = contextFor(await connectedStore('sample'));
    const res = await getRelatedNodes(ctx, 'CPU Scheduling');
    expect(names(res.relatedNodes)).toEqual(['Advanced', 'Context Switching', 'Processes', 'Round Robin', 'Threads']);
    expect(res.relationshipTypes).toEqual(['CONTAINS', 'HAS_SUBTOPIC', 'PREREQUISITE_FOR', 'USED_IN']);
  });
});

describe('getTopicWithSubtopics', () => {
  it('resolves among topics only', async () => {
    const ctx = contextFor(await connectedStore('sample'));
    const res = await getTopicWithSubtopics(ctx, 'proc');
    expect(res.topic?.name).toBe('Processes');
    expect(names(res.subtopics)).toEqual(['Context Switching', 'Process Control Block']);
    expect(res.subtopicCount).toBe(2);
  });

  it('does not treat a subtopic as a topic', async () => {
    const ctx = contextFor(await connectedStore('sample'));
    await expect(getTopicWithSubtopics(ctx, 'Paging')).resolves.toEqual({ topic: null, subtopics: [], subtopicCount: 0 });
  });

  it('returns a topic without subtopics', async () => {
    const ctx = contextFor(await connectedStore('sample'));
    const res = await getTopicWithSubtopics(ctx, 'Threads');
    expect(res.topic?.name).toBe('Threads');
    expect(res.subtopicCount).toBe(0);
  });
});
