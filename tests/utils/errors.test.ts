import { Vector2 } from '../../src/geometry/Vector';
import { GeometryError, ZeroVectorError } from '../../src/utils/errors';

jest.mock('../../src/utils/logger');

describe('Errors', () => {
  it('should name the base geometry error', () => {
    const error = new GeometryError('bad shape');
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('GeometryError');
    expect(error.message).toBe('bad shape');
  });

  it('should carry the sentinel vector on ZeroVectorError', () => {
    const error = new ZeroVectorError(Vector2.origin());
    expect(error).toBeInstanceOf(GeometryError);
    expect(error.name).toBe('ZeroVectorError');
    expect(error.vector).toEqual(new Vector2(0, 0));
    expect(error.message).toBe('Cannot normalize a zero-length vector');
  });

  it('should accept a custom message', () => {
    const error = new ZeroVectorError(Vector2.origin(), 'no direction');
    expect(error.message).toBe('no direction');
  });
});
