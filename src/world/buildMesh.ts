import type { Face, Mesh, Vertex } from '../shared/types.js';
import type { ReadonlyHeightGrid } from './HeightGrid.js';

/**
 * Triangulates a height grid. Every 2x2 block of cells becomes two faces,
 * (topLeft, topRight, bottomLeft) and (topRight, bottomRight, bottomLeft).
 * Grids with fewer than two rows or columns produce vertices but no faces.
 */
export function buildMesh(grid: ReadonlyHeightGrid): Mesh {
  const { rows, columns } = grid.resolution;

  const vertices: Vertex[] = new Array(rows * columns);
  for (let row = 0; row < rows; row++) {
    const cells = grid.row(row);
    for (let col = 0; col < columns; col++) {
      vertices[row * columns + col] = Object.freeze({ x: row, y: col, z: cells[col] });
    }
  }

  const blockCount = rows >= 2 && columns >= 2 ? (rows - 1) * (columns - 1) : 0;
  const faces: Face[] = new Array(blockCount * 2);
  for (let i = 0; i < blockCount; i++) {
    const col = i % (columns - 1);
    const row = Math.floor(i / (columns - 1));
    const topLeft = row * columns + col;
    const topRight = topLeft + 1;
    const bottomLeft = topLeft + columns;
    const bottomRight = bottomLeft + 1;
    faces[i * 2] = Object.freeze({ v1: topLeft, v2: topRight, v3: bottomLeft });
    faces[i * 2 + 1] = Object.freeze({ v1: topRight, v2: bottomRight, v3: bottomLeft });
  }

  return Object.freeze({
    resolution: Object.freeze({ rows, columns }),
    vertices: Object.freeze(vertices),
    edges: Object.freeze([]),
    faces: Object.freeze(faces),
  });
}

export function getMeshVertex(mesh: Mesh, row: number, col: number): Vertex {
  const { rows, columns } = mesh.resolution;
  if (row < 0 || row >= rows || col < 0 || col >= columns) {
    throw new RangeError(`Vertex (${row}, ${col}) is outside a ${rows}x${columns} mesh`);
  }
  return mesh.vertices[row * columns + col];
}
