import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { decide, replaceExtension, resolveCollision, type DecisionOptions } from '../../src/decide.js';
import { InvariantError, ReadError } from '../../src/errors.js';
import type { DetectionResult } from '../../src/types.js';

const png: DetectionResult = { detectedExt: 'png', detectedMime: 'image/png', confidence: 1, basis: 'signature:png' };
const txt: DetectionResult = { detectedExt: 'txt', detectedMime: 'text/plain', confidence: 0.4, basis: 'text-heuristic' };
const nothing: DetectionResult = {
  detectedExt: 'bin',
  detectedMime: 'application/octet-stream',
  confidence: 0,
  basis: 'no-signal',
};

function existing(...paths: string[]): (path: string) => boolean {
  const set = new Set(paths);
  return path => set.has(path);
}

const reportOnly: DecisionOptions = { renameEnabled: false, pathExists: existing() };
const renaming: DecisionOptions = { renameEnabled: true, pathExists: existing() };

describe('decide', () => {
  it('should report a PNG named .txt without renaming', () => {
    const verdict = decide({ path: join('in', 'photo.txt'), currentExt: 'txt', detection: png }, reportOnly);
    expect(verdict).toEqual({ isMatch: false, action: 'none', reason: 'mismatch-report-only' });
  });

  it('should rename a PNG named .txt when enabled', () => {
    const verdict = decide({ path: join('in', 'photo.txt'), currentExt: 'txt', detection: png }, renaming);
    expect(verdict).toEqual({
      isMatch: false,
      action: 'rename',
      reason: 'mismatch-rename',
      newPath: join('in', 'photo.png'),
    });
  });

  it('should skip taken names when renaming', () => {
    const dir = join('in');
    const verdict = decide(
      { path: join(dir, 'data.bin'), currentExt: 'bin', detection: png },
      { renameEnabled: true, pathExists: existing(join(dir, 'data.png'), join(dir, 'data_1.png')) },
    );
    expect(verdict.newPath).toBe(join(dir, 'data_2.png'));
  });

  it('should match within a family regardless of case and dot', () => {
    const jpg: DetectionResult = { detectedExt: 'jpg', detectedMime: 'image/jpeg', confidence: 1, basis: 'signature:jpg' };
    for (const currentExt of ['jpg', 'JPEG', '.jpe', 'Jfif']) {
      expect(decide({ path: 'a.x', currentExt, detection: jpg }, renaming)).toEqual({
        isMatch: true,
        action: 'none',
        reason: 'match',
      });
    }
  });

  it('should match a JSON file by the text heuristic', () => {
    const json: DetectionResult = { detectedExt: 'json', detectedMime: 'application/json', confidence: 0.7, basis: 'json-heuristic' };
    expect(decide({ path: 'notes.json', currentExt: 'json', detection: json }, renaming).reason).toBe('match');
  });

  it('should call an unreadable file an error', () => {
    const verdict = decide(
      { path: 'locked.jpg', currentExt: 'jpg', detection: new ReadError('locked.jpg', new Error('EACCES')) },
      renaming,
    );
    expect(verdict).toEqual({ isMatch: false, action: 'error', reason: 'unreadable' });
  });

  it('should treat no signal as inconclusive, not a mismatch', () => {
    const verdict = decide({ path: 'blob.dat', currentExt: 'dat', detection: nothing }, renaming);
    expect(verdict).toEqual({ isMatch: true, action: 'none', reason: 'inconclusive' });
  });

  it('should hold back renames below the confidence threshold', () => {
    const verdict = decide(
      { path: 'readme.png', currentExt: 'png', detection: txt },
      { ...renaming, minConfidence: 0.8 },
    );
    expect(verdict).toEqual({ isMatch: false, action: 'none', reason: 'mismatch-low-confidence' });
  });

  it('should rename at exactly the threshold', () => {
    const verdict = decide(
      { path: 'readme.png', currentExt: 'png', detection: txt },
      { ...renaming, minConfidence: 0.4 },
    );
    expect(verdict.action).toBe('rename');
    expect(verdict.newPath).toBe('readme.txt');
  });

  it('should add an extension to a file without one', () => {
    const verdict = decide({ path: join('in', 'README'), currentExt: '', detection: png }, renaming);
    expect(verdict.isMatch).toBe(false);
    expect(verdict.newPath).toBe(join('in', 'README.png'));
  });

  it('should treat unknown extensions as mismatches', () => {
    expect(decide({ path: 'a.xyz', currentExt: 'xyz', detection: png }, reportOnly).isMatch).toBe(false);
  });

  it('should throw when the detected extension has no family', () => {
    const odd: DetectionResult = { detectedExt: 'nope', detectedMime: 'x/nope', confidence: 1, basis: 'custom' };
    expect(() => decide({ path: 'a.nope', currentExt: 'nope', detection: odd }, reportOnly)).toThrow(InvariantError);
  });

  it('should return frozen verdicts', () => {
    expect(Object.isFrozen(decide({ path: 'a.txt', currentExt: 'txt', detection: png }, renaming))).toBe(true);
  });
});

describe('resolveCollision', () => {
  it('should return the candidate when it is free', () => {
    expect(resolveCollision(join('d', 'x.png'), existing())).toBe(join('d', 'x.png'));
  });

  it('should return the first free numbered name', () => {
    const taken = [join('d', 'x.png'), join('d', 'x_1.png'), join('d', 'x_2.png')];
    expect(resolveCollision(join('d', 'x.png'), existing(...taken))).toBe(join('d', 'x_3.png'));
  });

  it('should not skip a free gap', () => {
    const taken = [join('d', 'x.png'), join('d', 'x_2.png')];
    expect(resolveCollision(join('d', 'x.png'), existing(...taken))).toBe(join('d', 'x_1.png'));
  });

  it('should consult only the probe', () => {
    const probed: string[] = [];
    const result = resolveCollision(join('d', 'x.png'), path => {
      probed.push(path);
      return probed.length < 3;
    });
    expect(probed).toEqual([join('d', 'x.png'), join('d', 'x_1.png'), join('d', 'x_2.png')]);
    expect(result).toBe(join('d', 'x_2.png'));
  });

  it('should number names that have no extension', () => {
    expect(resolveCollision('README', existing('README'))).toBe('README_1');
  });
});

describe('replaceExtension', () => {
  it('should replace only the last extension', () => {
    expect(replaceExtension(join('a', 'archive.tar.txt'), 'gz')).toBe(join('a', 'archive.tar.gz'));
  });

  it('should append when there is no extension', () => {
    expect(replaceExtension(join('a', 'notes'), 'txt')).toBe(join('a', 'notes.txt'));
  });

  it('should keep dotfiles whole', () => {
    expect(replaceExtension(join('a', '.profile'), 'txt')).toBe(join('a', '.profile.txt'));
  });
});
