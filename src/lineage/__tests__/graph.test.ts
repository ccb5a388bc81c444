import { describe, it, expect } from 'vitest';
import { LineageGraph } from '../graph.js';
import { MetadataSnapshot } from '../../store/snapshot.js';
import { NotFoundError } from '../../errors.js';
import { emptyMetadataState, type DatasetVersion } from '../../schema.js';

/** Readable fake ids: uuid-shaped, distinguished by their first hex digit */
const ids = {
  a: 'a0000000-0000-4000-8000-000000000000',
  b: 'b0000000-0000-4000-8000-000000000000',
  c: 'c0000000-0000-4000-8000-000000000000',
  d: 'd0000000-0000-4000-8000-000000000000',
  e: 'e0000000-0000-4000-8000-000000000000',
  f: 'f0000000-0000-4000-8000-000000000000',
  g: '90000000-0000-4000-8000-000000000000',
  gone: '80000000-0000-4000-8000-000000000000',
};

let minute = 0;
function version(id: string, name: string, parentIds: string[] = []): DatasetVersion {
  const at = `2026-01-01T00:${String(minute++).padStart(2, '0')}:00.000Z`;
  return {
    id,
    name,
    fingerprint: '0'.repeat(64),
    description: null,
    author: 'tester',
    createdAt: at,
    updatedAt: at,
    parentIds,
    dataPointer: `memory://${name}`,
    shape: { columns: [], rowCount: 0, columnCount: 0 },
  };
}

//   a ─┬─ b ─┬─ d ── e
//      └─ c ─┘
//   a, gone ── f ── g
function graph(): LineageGraph {
  minute = 0;
  return new LineageGraph(
    new MetadataSnapshot({
      ...emptyMetadataState(),
      datasets: [
        version(ids.a, 'a'),
        version(ids.b, 'b', [ids.a]),
        version(ids.c, 'c', [ids.a]),
        version(ids.d, 'd', [ids.b, ids.c]),
        version(ids.e, 'e', [ids.d]),
        version(ids.f, 'f', [ids.a, ids.gone]),
        version(ids.g, 'g', [ids.f]),
      ],
    }),
  );
}

const names = (versions: DatasetVersion[]) => versions.map((v) => v.name);

describe('LineageGraph', () => {
  it('lists direct parents in parentIds order', () => {
    const { versions, dangling } = graph().parentsOf(ids.d);
    expect(names(versions)).toEqual(['b', 'c']);
    expect(dangling).toEqual([]);
  });

  it('lists direct children in creation order', () => {
    expect(names(graph().childrenOf(ids.a))).toEqual(['b', 'c', 'f']);
  });

  it('walks ancestors breadth-first without repeats', () => {
    expect(names(graph().ancestors(ids.e).versions)).toEqual(['d', 'b', 'c', 'a']);
  });

  it('walks descendants breadth-first without repeats', () => {
    expect(names(graph().descendants(ids.a))).toEqual(['b', 'c', 'f', 'd', 'g', 'e']);
  });

  it('reports a force-deleted parent as dangling', () => {
    const { versions, dangling } = graph().parentsOf(ids.f);
    expect(names(versions)).toEqual(['a']);
    expect(dangling).toHaveLength(1);
    expect(dangling[0]).toMatchObject({ ancestorId: ids.gone, referencedBy: ids.f });
  });

  it('keeps walking past a dangling ancestor', () => {
    const { versions, dangling } = graph().ancestors(ids.g);
    expect(names(versions)).toEqual(['f', 'a']);
    expect(dangling.map((d) => d.ancestorId)).toEqual([ids.gone]);
  });

  it('reports a deleted ancestor once for each version that references it', () => {
    minute = 0;
    const shared = new LineageGraph(
      new MetadataSnapshot({
        ...emptyMetadataState(),
        datasets: [
          version(ids.a, 'a', [ids.gone]),
          version(ids.b, 'b', [ids.gone]),
          version(ids.c, 'c', [ids.a, ids.b]),
        ],
      }),
    );
    const { versions, dangling } = shared.ancestors(ids.c);
    expect(names(versions)).toEqual(['a', 'b']);
    expect(dangling.map((d) => [d.ancestorId, d.referencedBy])).toEqual([
      [ids.gone, ids.a],
      [ids.gone, ids.b],
    ]);
  });

  it('finds children of a deleted id', () => {
    expect(names(graph().childrenOf(ids.gone))).toEqual(['f']);
  });

  it('finds the roots of a version', () => {
    expect(names(graph().roots(ids.e).roots)).toEqual(['a']);
  });

  it('finds a direct parent by name', () => {
    expect(graph().parentByName(ids.d, 'c').id).toBe(ids.c);
    expect(() => graph().parentByName(ids.d, 'a')).toThrow(NotFoundError);
  });

  it('rejects unknown ids', () => {
    expect(() => graph().parentsOf(ids.gone)).toThrow(NotFoundError);
    expect(() => graph().ancestors(ids.gone)).toThrow(NotFoundError);
  });

  it('terminates on a cycle in hand-edited metadata', () => {
    minute = 0;
    const cyclic = new LineageGraph(
      new MetadataSnapshot({
        ...emptyMetadataState(),
        datasets: [version(ids.a, 'a', [ids.b]), version(ids.b, 'b', [ids.a])],
      }),
    );
    expect(names(cyclic.ancestors(ids.a).versions)).toEqual(['b']);
    expect(names(cyclic.descendants(ids.a))).toEqual(['b']);
  });
});
