export type TerrainErrorKind = 'InvalidResolution' | 'InvalidConfiguration';

export class TerrainError extends Error {
  readonly kind: TerrainErrorKind;

  constructor(kind: TerrainErrorKind, message: string) {
    super(message);
    this.name = 'TerrainError';
    this.kind = kind;
  }
}

export function isTerrainError(error: unknown): error is TerrainError {
  return error instanceof TerrainError;
}
