import { describe, it, expect } from 'vitest';
import { parseJson } from '../../src/utils/parseJson.js';

describe('parseJson', () => {
  it('should return an already parsed list of references as is', () => {
    const refs = [{ ownerId: 1, fragmentId: 2 }];
    expect(parseJson(refs)).toBe(refs);
  });

  it('should parse references stored as text', () => {
    expect(parseJson('[{"ownerId":1,"fragmentId":2}]')).toEqual([{ ownerId: 1, fragmentId: 2 }]);
  });

  it('should parse a vector stored as text', () => {
    expect(parseJson('[0.25,-0.5]')).toEqual([0.25, -0.5]);
  });

  it('should pass null through', () => {
    expect(parseJson(null)).toBeNull();
  });

  it('should throw on text that is not JSON', () => {
    expect(() => parseJson('not json')).toThrow(SyntaxError);
  });
});
