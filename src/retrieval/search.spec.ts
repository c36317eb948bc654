// file: src/retrieval/search.spec.ts
import { describe, expect, it } from 'vitest';
import { InvalidRequestError } from '../errors';
import { connectedStore, contextFor, names, topic } from '../testing/graph_fixtures';
import { getAllLevels, getNodeDetails, search } from './search';

describe('search', () => {
  it('lists every topic ordered by name', async () => {
    const ctx = contextFor(await connectedStore('sample'));
    const res = await search(ctx, { label: 'Topic', limit: 10 });
    expect(names(res.results)).toEqual([
      'CPU Scheduling',
      'Memory Management',
      'OS Fundamentals',
      'Processes',
      'Synchronization',
      'Threads',
      'Virtual Memory',
    ]);
    expect(res.count).toBe(res.results.length);
    expect(res.results.every(n => n.labels.includes('Topic'))).toBe(true);
  });

  it('cuts the list at the limit', async () => {
    const ctx = contextFor(await connectedStore('sample'));
    const res = await search(ctx, { label: 'Topic', limit: 3 });
    expect(res.count).toBe(3);
    expect(names(res.results)).toEqual(['CPU Scheduling', 'Memory Management', 'OS Fundamentals']);
  });

  it('matches name fragments across labels without case', async () => {
    const ctx = contextFor(await connectedStore('sample'));
    const res = await search(ctx, { name: 'PROC' });
    expect(names(res.results)).toEqual(['Process Control Block', 'Processes']);
  });

  it('combines label and difficulty filters', async () => {
    const ctx = contextFor(await connectedStore('sample'));
    const res = await search(ctx, { label: 'Topic', difficulty: 'Advanced' });
    expect(names(res.results)).toEqual(['CPU Scheduling', 'Synchronization', 'Virtual Memory']);
  });

  it('returns an empty success when nothing matches', async () => {
    const ctx = contextFor(await connectedStore('sample'));
    await expect(search(ctx, { name: 'quantum' })).resolves.toEqual({ count: 0, results: [] });
  });

  it('rejects limits outside 1..500 before touching the store', async () => {
    const ctx = contextFor(await connectedStore('sample'));
    await expect(search(ctx, { limit: 0 })).rejects.toBeInstanceOf(InvalidRequestError);
    await expect(search(ctx, { limit: 501 })).rejects.toBeInstanceOf(InvalidRequestError);
  });

  it('flattens node properties next to name and labels', async () => {
    const ctx = contextFor(await connectedStore('sample'));
    const res = await search(ctx, { name: 'OS Fundamentals' });
    expect(res.results).toEqual([
      {
        name: 'OS Fundamentals',
        labels: ['Topic'],
        difficulty: 'beginner',
        order: 1,
        description: 'What an operating system does',
        estimated_hours: 6,
        key_concepts: ['kernel', 'system call', 'user mode'],
      },
    ]);
  });

  it('is idempotent', async () => {
    const ctx = contextFor(await connectedStore('sample'));
    const first = await search(ctx, { difficulty: 'intermediate', limit: 20 });
    await expect(search(ctx, { difficulty: 'intermediate', limit: 20 })).resolves.toEqual(first);
  });
});

describe('getNodeDetails', () => {
  it('resolves exact names without case', async () => {
    const ctx = contextFor(await connectedStore('sample'));
    const res = await getNodeDetails(ctx, 'threads');
    expect(res.node?.name).toBe('Threads');
  });

  it('falls back to the first partial match', async () => {
    const ctx = contextFor(await connectedStore('sample'));
    const res = await getNodeDetails(ctx, 'Memory');
    expect(res.node?.name).toBe('Memory Management');
  });

  it('returns records that do not share lists with the graph', async () => {
    const ctx = contextFor(
      await connectedStore({ nodes: [topic('s', 'Sorting', { key_concepts: ['merge', 'quick'] })], relationships: [] }),
    );
    const first = await getNodeDetails(ctx, 'Sorting');
    const concepts = first.node?.key_concepts;
    if (Array.isArray(concepts)) concepts.push('changed');

    const second = await getNodeDetails(ctx, 'Sorting');
    expect(second.node?.key_concepts).toEqual(['merge', 'quick']);
  });

  it('returns null for unknown or blank names', async () => {
    const ctx = contextFor(await connectedStore('sample'));
    await expect(getNodeDetails(ctx, 'nothing')).resolves.toEqual({ node: null });
    await expect(getNodeDetails(ctx, '   ')).resolves.toEqual({ node: null });
  });
});

describe('getAllLevels', () => {
  it('orders levels by their order property', async () => {
    const ctx = contextFor(await connectedStore('sample'));
    const levels = await getAllLevels(ctx);
    expect(names(levels)).toEqual(['Beginner', 'Intermediate', 'Advanced']);
    expect(levels.every(l => l.labels.includes('Level'))).toBe(true);
  });
});
