/**
 * Tests for gitignore pattern handling
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { createIgnoreFilter, parseGitignoreContent } from '../ignore.js';

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

describe('parseGitignoreContent', () => {
  it('skips empty lines and comments', () => {
    const content = `
# drafts are private
drafts/

*.tmp
`;
    expect(parseGitignoreContent(content)).toEqual(['drafts/', '*.tmp']);
  });

  it('preserves negation patterns', () => {
    expect(parseGitignoreContent('*.md\n!README.md\n')).toEqual(['*.md', '!README.md']);
  });

  it('handles CRLF line endings', () => {
    expect(parseGitignoreContent('a.txt\r\nb.txt\r\n')).toEqual(['a.txt', 'b.txt']);
  });
});

describe('createIgnoreFilter', () => {
  beforeEach(() => {
    vi.mocked(existsSync).mockReset();
    vi.mocked(readFileSync).mockReset();
  });

  it('always ignores the default patterns', () => {
    vi.mocked(existsSync).mockReturnValue(false);
    const shouldIgnore = createIgnoreFilter({ rootPath: '/data' });

    expect(shouldIgnore('node_modules/pkg/readme.md')).toBe(true);
    expect(shouldIgnore('.git/HEAD')).toBe(true);
    expect(shouldIgnore('notes.md')).toBe(false);
  });

  it('reads .gitignore from the root directory', () => {
    vi.mocked(existsSync).mockReturnValue(true);
    vi.mocked(readFileSync).mockReturnValue('private/\n');
    const shouldIgnore = createIgnoreFilter({ rootPath: '/data' });

    expect(existsSync).toHaveBeenCalledWith('/data/.gitignore');
    expect(shouldIgnore('private/secret.txt')).toBe(true);
    expect(shouldIgnore('public/info.txt')).toBe(false);
  });

  it('applies additional patterns after .gitignore', () => {
    vi.mocked(existsSync).mockReturnValue(true);
    vi.mocked(readFileSync).mockReturnValue('*.txt\n');
    const shouldIgnore = createIgnoreFilter({
      rootPath: '/data',
      additionalPatterns: ['!keep.txt'],
    });

    expect(shouldIgnore('drop.txt')).toBe(true);
    expect(shouldIgnore('keep.txt')).toBe(false);
  });

  it('accepts absolute paths under the root', () => {
    vi.mocked(existsSync).mockReturnValue(false);
    const shouldIgnore = createIgnoreFilter({ rootPath: '/data', additionalPatterns: ['*.log'] });

    expect(shouldIgnore('/data/run.log')).toBe(true);
    expect(shouldIgnore('/data')).toBe(false);
  });
});
