import { config } from '../config/env';
import { Result, ok, err } from '../types/result';
import { ZeroVectorError } from '../utils/errors';
import logger from '../utils/logger';

/**
 * Immutable 2-D vector. Components are taken verbatim, so NaN and
 * Infinity are accepted and flow through the arithmetic untouched.
 */
export class Vector2 {
  public readonly x: number;
  public readonly y: number;

  constructor(x: number, y: number) {
    this.x = x;
    this.y = y;
  }

  static origin(): Vector2 { return new Vector2(0, 0); }

  // ---------- arithmetic ----------
  add(v: Vector2): Vector2      { return new Vector2(this.x + v.x, this.y + v.y); }
  subtract(v: Vector2): Vector2 { return new Vector2(this.x - v.x, this.y - v.y); }
  scale(c: number): Vector2     { return new Vector2(this.x * c, this.y * c); }

  /**
   * Divides both components by `c`. There is no zero check: dividing by 0
   * gives Infinity or NaN components, and guarding against that is up to
   * the caller.
   */
  divide(c: number): Vector2 { return new Vector2(this.x / c, this.y / c); }

  dot(v: Vector2): number { return this.x * v.x + this.y * v.y; }

  static add(a: Vector2, b: Vector2): Vector2      { return a.add(b); }
  static subtract(a: Vector2, b: Vector2): Vector2 { return a.subtract(b); }
  static dot(a: Vector2, b: Vector2): number       { return a.dot(b); }

  // ---------- magnitude & direction ----------
  normSquared(): number { return this.x * this.x + this.y * this.y; }

  // Plain sqrt rather than Math.hypot: components small enough to underflow count as zero.
  norm(): number { return Math.sqrt(this.normSquared()); }

  isZero(): boolean { return this.norm() === 0; }

  /** Angle from the positive x-axis in (-PI, PI]. The zero vector reports 0. */
  radian(): number { return Math.atan2(this.y, this.x); }

  // ---------- normalization ----------

  /**
   * Returns the vector scaled to length 1. A zero-length vector has no
   * direction, so it fails with the origin as the error payload.
   *
   * @example
   * const r = new Vector2(3, 4).unit();
   * if (r.ok) r.value; // (0.6, 0.8)
   */
  unit(): Result<Vector2, Vector2> {
    const n = this.norm();
    if (n === 0) {
      return err(Vector2.origin());
    }
    return ok(this.divide(n));
  }

  unitOrThrow(): Vector2 {
    const result = this.unit();
    if (!result.ok) {
      logger.debug(`Refusing to normalize zero vector ${this.toString()}`);
      throw new ZeroVectorError(result.error);
    }
    return result.value;
  }

  // ---------- comparison ----------
  equals(v: Vector2): boolean { return this.x === v.x && this.y === v.y; }

  approxEquals(v: Vector2, epsilon: number = config.vectorEpsilon): boolean {
    return Math.abs(this.x - v.x) <= epsilon && Math.abs(this.y - v.y) <= epsilon;
  }

  toString(): string { return `(${this.x}, ${this.y})`; }
}
