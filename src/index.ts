export { Vector2 } from './geometry/Vector';
export type { Result } from './types/result';
export { ok, err } from './types/result';
export { GeometryError, ZeroVectorError } from './utils/errors';
export { config } from './config/env';
export { default as logger } from './utils/logger';
