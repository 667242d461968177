import { describe, it, expect } from 'vitest';

import { parseOutputArg } from '../../src/cli/args.js';

describe('parseOutputArg', () => {
  it('should accept the long, short and inline forms', () => {
    expect(parseOutputArg(['--output', 'out/run1'])).toBe('out/run1');
    expect(parseOutputArg(['-o', 'out'])).toBe('out');
    expect(parseOutputArg(['--verbose', '--output=/tmp/x'])).toBe('/tmp/x');
  });

  it('should return undefined when the flag is absent', () => {
    expect(parseOutputArg([])).toBeUndefined();
    expect(parseOutputArg(['--verbose'])).toBeUndefined();
  });

  it('should reject a flag without a directory', () => {
    expect(() => parseOutputArg(['--output'])).toThrow('--output requires a directory');
    expect(() => parseOutputArg(['-o', '--verbose'])).toThrow('-o requires a directory');
  });
});
