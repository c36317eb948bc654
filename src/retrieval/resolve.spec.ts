// file: src/retrieval/resolve.spec.ts
import { describe, expect, it } from 'vitest';
import { AmbiguousNameError } from '../errors';
import { connectedStore, contextFor, topic } from '../testing/graph_fixtures';
import { resolveNode } from './resolve';

const SORTS = {
  nodes: [topic('t1', 'Bubble Sort'), topic('t2', 'Sort'), topic('t3', 'Heap')],
  relationships: [],
};

describe('resolveNode', () => {
  it('prefers an exact match over an earlier partial one', async () => {
    const ctx = contextFor(await connectedStore(SORTS));
    const node = await resolveNode(ctx, 'sort', { planId: 'test' });
    expect(node?.id).toBe('t2');
  });

  it('takes the first partial match by name in prefer-exact mode', async () => {
    const ctx = contextFor(await connectedStore(SORTS));
    const node = await resolveNode(ctx, 'or', { planId: 'test' });
    expect(node?.id).toBe('t1');
  });

  it('reports ambiguous partial matches in strict mode', async () => {
    const ctx = contextFor(await connectedStore(SORTS), { nameResolution: 'strict' });
    const err = await resolveNode(ctx, 'or', { planId: 'test' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AmbiguousNameError);
    if (err instanceof AmbiguousNameError) expect(err.candidates).toEqual(['Bubble Sort', 'Sort']);
  });

  it('accepts a single partial match in strict mode', async () => {
    const ctx = contextFor(await connectedStore(SORTS), { nameResolution: 'strict' });
    const node = await resolveNode(ctx, 'hea', { planId: 'test' });
    expect(node?.id).toBe('t3');
  });

  it('restricts candidates to a label', async () => {
    const ctx = contextFor(await connectedStore('sample'));
    const node = await resolveNode(ctx, 'proc', { planId: 'test', label: 'Subtopic' });
    expect(node?.id).toBe('s-pcb');
  });
});
