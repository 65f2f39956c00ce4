/**
 * Tests for git helpers that do not need a repository.
 */

import { describe, it, expect } from 'vitest';
import { branchLabels, parseRevisionRef } from '../src/utils/git.js';
import { FakeVersionControl } from './helpers/cli.js';

describe('parseRevisionRef', () => {
  it('splits revision and path', () => {
    expect(parseRevisionRef('HEAD:secrets.yaml')).toEqual({ revision: 'HEAD', path: 'secrets.yaml' });
    expect(parseRevisionRef('main~1:config/app.json')).toEqual({ revision: 'main~1', path: 'config/app.json' });
  });

  it('splits at the first colon', () => {
    expect(parseRevisionRef('HEAD:dir/a:b.yaml')).toEqual({ revision: 'HEAD', path: 'dir/a:b.yaml' });
  });

  it('returns null for plain paths', () => {
    expect(parseRevisionRef('secrets.yaml')).toBeNull();
    expect(parseRevisionRef(':secrets.yaml')).toBeNull();
    expect(parseRevisionRef('HEAD:')).toBeNull();
  });

  it('returns null for Windows drive paths', () => {
    expect(parseRevisionRef('C:\\secrets.yaml')).toBeNull();
    expect(parseRevisionRef('d:/secrets.yaml')).toBeNull();
  });
});

describe('branchLabels', () => {
  it('names both branches during a merge', () => {
    expect(branchLabels(new FakeVersionControl({ branch: 'main', merging: 'feature/login' }))).toEqual({
      ours: 'main',
      theirs: 'incoming changes from feature/login',
    });
  });

  it('falls back to generic labels', () => {
    expect(branchLabels(new FakeVersionControl())).toEqual({
      ours: 'your branch',
      theirs: 'incoming changes',
    });
  });
});
