import type { Vector2 } from '../geometry/Vector';

export class GeometryError extends Error {
    constructor(message: string) {
      super(message);
      this.name = 'GeometryError';
    }
  }

  export class ZeroVectorError extends GeometryError {
    public vector: Vector2;

    constructor(vector: Vector2, message = 'Cannot normalize a zero-length vector') {
      super(message);
      this.vector = vector;
      this.name = 'ZeroVectorError';
    }
  }
