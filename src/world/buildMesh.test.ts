import { describe, it, expect } from 'vitest';
import { buildMesh, getMeshVertex } from './buildMesh.js';
import { HeightGrid, initializeGrid } from './HeightGrid.js';

describe('buildMesh', () => {
  it('emits one vertex per cell in row-major order', () => {
    const grid = HeightGrid.fromArray([[0, 1, 2], [3, 4, 5]]);
    const mesh = buildMesh(grid);
    expect(mesh.vertices).toHaveLength(6);
    expect(mesh.vertices[4]).toEqual({ x: 1, y: 1, z: 4 });
    expect(getMeshVertex(mesh, 1, 2)).toEqual({ x: 1, y: 2, z: 5 });
  });

  it('splits every 2x2 block into two triangles', () => {
    const mesh = buildMesh(initializeGrid({ rows: 3, columns: 4 }));
    expect(mesh.faces).toHaveLength(12);
    expect(mesh.faces[0]).toEqual({ v1: 0, v2: 1, v3: 4 });
    expect(mesh.faces[1]).toEqual({ v1: 1, v2: 5, v3: 4 });
    // last block starts at row 1, column 2
    expect(mesh.faces[10]).toEqual({ v1: 6, v2: 7, v3: 10 });
    expect(mesh.faces[11]).toEqual({ v1: 7, v2: 11, v3: 10 });
  });

  it('produces 2 * (rows - 1) * (columns - 1) faces with valid indices', () => {
    for (const [rows, columns] of [[2, 2], [5, 3], [4, 9]]) {
      const mesh = buildMesh(initializeGrid({ rows, columns }));
      expect(mesh.faces).toHaveLength(2 * (rows - 1) * (columns - 1));
      for (const face of mesh.faces) {
        for (const index of [face.v1, face.v2, face.v3]) {
          expect(index).toBeGreaterThanOrEqual(0);
          expect(index).toBeLessThan(rows * columns);
        }
      }
    }
  });

  it('has no faces for single-row or single-column grids', () => {
    expect(buildMesh(initializeGrid({ rows: 1, columns: 5 })).faces).toHaveLength(0);
    expect(buildMesh(initializeGrid({ rows: 4, columns: 1 })).faces).toHaveLength(0);
    const single = buildMesh(initializeGrid({ rows: 1, columns: 1 }));
    expect(single.vertices).toHaveLength(1);
    expect(single.faces).toHaveLength(0);
  });

  it('leaves the edge list empty', () => {
    expect(buildMesh(initializeGrid({ rows: 3, columns: 3 })).edges).toEqual([]);
  });

  it('returns a frozen mesh', () => {
    const mesh = buildMesh(initializeGrid({ rows: 2, columns: 2 }));
    expect(Object.isFrozen(mesh)).toBe(true);
    expect(Object.isFrozen(mesh.vertices)).toBe(true);
    expect(Object.isFrozen(mesh.faces)).toBe(true);
  });

  it('rejects vertex lookups outside the grid', () => {
    const mesh = buildMesh(initializeGrid({ rows: 2, columns: 2 }));
    expect(() => getMeshVertex(mesh, 2, 0)).toThrow(RangeError);
  });
});
