/**
 * Tests for conflict extraction, composition and resolution checks.
 */

import { Chalk } from 'chalk';
import { describe, it, expect } from 'vitest';
import { colorizeConflict } from '../src/conflict/colorize.js';
import { assertResolved, composeConflict, composeMergeDraft, validateResolved } from '../src/conflict/compose.js';
import { extractSides } from '../src/conflict/extract.js';
import { classifyMarker, hasConflictMarkers } from '../src/conflict/markers.js';
import { SecretDiffError } from '../src/errors.js';

const labels = { ours: 'main', theirs: 'incoming changes from feature' };

function caught(fn: () => unknown): SecretDiffError {
  try {
    fn();
  } catch (err) {
    if (err instanceof SecretDiffError) return err;
    throw err;
  }
  throw new Error('expected a SecretDiffError');
}

describe('classifyMarker', () => {
  it('recognizes marker lines', () => {
    expect(classifyMarker('<<<<<<< HEAD')).toBe('start');
    expect(classifyMarker('||||||| merged common ancestors')).toBe('base');
    expect(classifyMarker('|||||||')).toBe('base');
    expect(classifyMarker('=======')).toBe('separator');
    expect(classifyMarker('>>>>>>> feature')).toBe('end');
  });

  it('ignores look-alikes', () => {
    expect(classifyMarker('<<<<<<<HEAD')).toBeNull();
    expect(classifyMarker('======= trailing')).toBeNull();
    expect(classifyMarker('key: <<<<<<< x')).toBeNull();
  });
});

describe('hasConflictMarkers', () => {
  it('looks for a start marker line', () => {
    expect(hasConflictMarkers('a\n<<<<<<< HEAD\n')).toBe(true);
    expect(hasConflictMarkers('a\n=======\n')).toBe(false);
  });
});

describe('extractSides', () => {
  it('splits a single conflict and keeps common lines on both sides', () => {
    const sides = extractSides('x\n<<<<<<< HEAD\na\n=======\nb\n>>>>>>> br\ny\n');
    expect(sides).toEqual({ ours: 'x\na\ny', theirs: 'x\nb\ny', conflicts: 1 });
  });

  it('accepts CRLF line endings', () => {
    const sides = extractSides('a\r\n<<<<<<< HEAD\r\nb\r\n=======\r\nc\r\n>>>>>>> x\r\n');
    expect(sides.ours).toBe('a\nb');
    expect(sides.theirs).toBe('a\nc');
  });

  it('handles several conflict blocks', () => {
    const text = '<<<<<<< HEAD\n1\n=======\n2\n>>>>>>> x\nmid\n<<<<<<< HEAD\n3\n=======\n4\n>>>>>>> x\n';
    expect(extractSides(text)).toEqual({ ours: '1\nmid\n3', theirs: '2\nmid\n4', conflicts: 2 });
  });

  it('collects diff3 base sections separately', () => {
    const sides = extractSides('c\n<<<<<<< HEAD\no\n||||||| base\nb\n=======\nt\n>>>>>>> x\n');
    expect(sides).toEqual({ ours: 'c\no', theirs: 'c\nt', base: 'c\nb', conflicts: 1 });
  });

  it('leaves base unset when only some blocks carry one', () => {
    const text = '<<<<<<< A\no\n||||||| base\nb\n=======\nt\n>>>>>>> B\n<<<<<<< A\no2\n=======\nt2\n>>>>>>> B\n';
    expect(extractSides(text).base).toBeUndefined();
  });

  it('treats a separator outside a conflict as content', () => {
    const sides = extractSides('=======\n<<<<<<< H\na\n=======\nb\n>>>>>>> x\n');
    expect(sides.ours).toBe('=======\na');
    expect(sides.theirs).toBe('=======\nb');
  });

  it('fails when there is no conflict', () => {
    const err = caught(() => extractSides('a: 1\n', 'secrets.yaml'));
    expect(err.code).toBe('NO_CONFLICT_MARKERS');
    expect(err.message).toBe('File secrets.yaml does not contain Git conflicts');
  });

  describe('malformed markers', () => {
    const cases: Array<[string, string, string]> = [
      ['a nested start marker', '<<<<<<< A\na\n<<<<<<< B\n', 'Conflict start marker inside an open conflict at line 3'],
      ['an end marker before the separator', '<<<<<<< A\na\n>>>>>>> B\n', 'Conflict end marker before separator at line 3'],
      ['a second separator', '<<<<<<< A\na\n=======\nb\n=======\n', 'Second conflict separator at line 5'],
      ['a base marker in the theirs region', '<<<<<<< A\na\n=======\n||||||| base\n', 'Base section marker outside the ours region at line 4'],
      ['a second base marker', '<<<<<<< A\n||||||| one\n||||||| two\n', 'Base section marker outside the ours region at line 3'],
      ['an unterminated conflict', 'x\n<<<<<<< A\na\n=======\nb\n', 'Conflict opened at line 2 is never closed'],
    ];

    for (const [name, text, message] of cases) {
      it(`fails fast on ${name}`, () => {
        const err = caught(() => extractSides(text, 'f.yaml'));
        expect(err.code).toBe('MALFORMED_CONFLICT');
        expect(err.stage).toBe('extract');
        expect(err.file).toBe('f.yaml');
        expect(err.message).toBe(message);
      });
    }
  });
});

describe('composeConflict', () => {
  it('builds a labelled conflict block', () => {
    expect(composeConflict('a: 1\n', 'a: 2\n', labels)).toBe(
      '<<<<<<< HEAD (main branch)\na: 1\n=======\na: 2\n>>>>>>> OTHER (incoming changes from feature)\n',
    );
  });

  it('terminates sides that lack a trailing newline', () => {
    expect(composeConflict('a', 'b', { ours: 'dev', theirs: 'incoming changes' })).toBe(
      '<<<<<<< HEAD (dev branch)\na\n=======\nb\n>>>>>>> OTHER (incoming changes)\n',
    );
  });

  it('includes a base section when given', () => {
    expect(composeConflict('o', 't', labels, 'b')).toBe(
      '<<<<<<< HEAD (main branch)\no\n||||||| BASE\nb\n=======\nt\n>>>>>>> OTHER (incoming changes from feature)\n',
    );
  });

  it('round-trips through extractSides', () => {
    const sides = extractSides(composeConflict('o1\no2', 't1', labels, 'b1'));
    expect(sides).toEqual({ ours: 'o1\no2', theirs: 't1', base: 'b1', conflicts: 1 });
  });

  it('round-trips an empty side', () => {
    const sides = extractSides(composeConflict('', 'only theirs', labels));
    expect(sides).toEqual({ ours: '', theirs: 'only theirs', conflicts: 1 });
  });
});

describe('composeMergeDraft', () => {
  it('marks the local and remote sides', () => {
    expect(composeMergeDraft('a', 'b\n')).toBe('<<<<<<< LOCAL\na\n=======\nb\n>>>>>>> REMOTE\n');
  });
});

describe('validateResolved', () => {
  it('rejects text with any marker line left', () => {
    expect(validateResolved('a\n<<<<<<< HEAD\nb\n')).toBe(false);
    expect(validateResolved('a\n=======\n')).toBe(false);
    expect(validateResolved('a\n>>>>>>> theirs\n')).toBe(false);
    expect(validateResolved('a\n||||||| base\n')).toBe(false);
  });

  it('accepts text with the markers removed', () => {
    expect(validateResolved('a\nb\n')).toBe(true);
    expect(validateResolved('note: "<<<<<<< not at line start"\n')).toBe(true);
  });

  it('is enforced by assertResolved', () => {
    const err = caught(() => assertResolved('<<<<<<< LOCAL\n', 'merged.yaml'));
    expect(err.code).toBe('UNRESOLVED_CONFLICT');
    expect(err.stage).toBe('validate');
    expect(err.file).toBe('merged.yaml');
    expect(() => assertResolved('a: 1\n')).not.toThrow();
  });
});

describe('colorizeConflict', () => {
  it('colors markers and each region', () => {
    const colors = new Chalk({ level: 1 });
    const text = 'common\n<<<<<<< HEAD\nours\n||||||| BASE\nbase\n=======\ntheirs\n>>>>>>> OTHER\n';
    expect(colorizeConflict(text, colors).split('\n')).toEqual([
      'common',
      colors.cyan('<<<<<<< HEAD'),
      colors.red('ours'),
      colors.cyan('||||||| BASE'),
      colors.gray('base'),
      colors.cyan('======='),
      colors.green('theirs'),
      colors.cyan('>>>>>>> OTHER'),
      '',
    ]);
  });
});
