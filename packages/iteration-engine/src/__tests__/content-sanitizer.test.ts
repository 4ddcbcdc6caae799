import { describe, it, expect } from 'vitest';
import { sanitizeGeneratedContent } from '../output/content-sanitizer.js';

describe('sanitizeGeneratedContent', () => {
  it('strips a surrounding code fence', () => {
    expect(sanitizeGeneratedContent('```python\nprint(1)\n```')).toBe('print(1)\n');
  });

  it('unescapes literal newline sequences', () => {
    expect(sanitizeGeneratedContent('a = 1\\nb = 2')).toBe('a = 1\nb = 2\n');
  });

  it('unescapes unicode sequences once a literal escape is present', () => {
    expect(sanitizeGeneratedContent('name\\tvalue\\u0041')).toBe('name\tvalueA\n');
  });

  it('leaves content without literal escapes untouched', () => {
    expect(sanitizeGeneratedContent('path = "C:\\\\x"')).toBe('path = "C:\\\\x"\n');
  });

  it('ends the content with exactly one trailing newline', () => {
    expect(sanitizeGeneratedContent('x = 1\n\n')).toBe('x = 1\n');
  });
});
