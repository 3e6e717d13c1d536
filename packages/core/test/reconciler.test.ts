/**
 * Tests for frontmatter reconciliation
 */

import { describe, it, expect } from 'vitest';
import { partitionFrontmatter, reconcileFrontmatter } from '../src/reconciler.js';

const MODULE_CANONICAL = {
  program: 'Prog',
  course: 'Course',
  class: 'Class',
  module: 'Module1',
};

describe('reconcileFrontmatter', () => {
  describe('adding and correcting applicable fields', () => {
    it('should add missing fields in level order', () => {
      const result = reconcileFrontmatter({ title: 'Week 1' }, MODULE_CANONICAL, 4, 'none');

      expect(Object.keys(result.frontmatter)).toEqual(['title', 'program', 'course', 'class', 'module']);
      expect(result.changes).toEqual([
        { kind: 'added', field: 'program', newValue: 'Prog' },
        { kind: 'added', field: 'course', newValue: 'Course' },
        { kind: 'added', field: 'class', newValue: 'Class' },
        { kind: 'added', field: 'module', newValue: 'Module1' },
      ]);
    });

    it('should overwrite a wrong but non-empty value', () => {
      const result = reconcileFrontmatter(
        { program: 'Prog', course: 'Old Course Name' },
        { program: 'Prog', course: 'Course' },
        2,
        'none'
      );

      expect(result.frontmatter).toEqual({ program: 'Prog', course: 'Course' });
      expect(result.changes).toEqual([
        { kind: 'corrected', field: 'course', oldValue: 'Old Course Name', newValue: 'Course', malformed: false },
      ]);
    });

    it('should overwrite an empty value', () => {
      const result = reconcileFrontmatter({ program: '' }, { program: 'Prog' }, 1, 'none');

      expect(result.frontmatter).toEqual({ program: 'Prog' });
      expect(result.changes).toEqual([
        { kind: 'corrected', field: 'program', oldValue: '', newValue: 'Prog', malformed: false },
      ]);
    });

    it('should overwrite and flag values of the wrong shape', () => {
      const result = reconcileFrontmatter(
        { program: ['Prog', 'Other'], course: null, class: 42 },
        { program: 'Prog', course: 'Course', class: 'Class' },
        3,
        'none'
      );

      expect(result.frontmatter).toEqual({ program: 'Prog', course: 'Course', class: 'Class' });
      expect(result.changes).toEqual([
        { kind: 'corrected', field: 'program', oldValue: ['Prog', 'Other'], newValue: 'Prog', malformed: true },
        { kind: 'corrected', field: 'course', oldValue: null, newValue: 'Course', malformed: true },
        { kind: 'corrected', field: 'class', oldValue: 42, newValue: 'Class', malformed: true },
      ]);
    });

    it('should keep corrected fields in their original position', () => {
      const result = reconcileFrontmatter(
        { title: 'T', course: 'Wrong', tags: ['a'], program: 'Prog' },
        { program: 'Prog', course: 'Course' },
        2,
        'none'
      );

      expect(Object.keys(result.frontmatter)).toEqual(['title', 'course', 'tags', 'program']);
    });
  });

  describe('removing fields beyond maxLevel', () => {
    it('should strip all hierarchy fields when maxLevel is 0', () => {
      const result = reconcileFrontmatter(
        { course: 'MBA.md', program: 'x', class: 'y', module: 'z' },
        {},
        0,
        'main'
      );

      expect(result.frontmatter).toEqual({ 'index-type': 'main' });
      expect(result.changes).toEqual([
        { kind: 'removed', field: 'course', oldValue: 'MBA.md' },
        { kind: 'removed', field: 'program', oldValue: 'x' },
        { kind: 'removed', field: 'class', oldValue: 'y' },
        { kind: 'removed', field: 'module', oldValue: 'z' },
        { kind: 'added', field: 'index-type', newValue: 'main' },
      ]);
    });

    it('should remove deeper fields even when they are empty', () => {
      const result = reconcileFrontmatter({ program: 'Prog', module: '' }, { program: 'Prog' }, 1, 'program');

      expect(result.frontmatter).toEqual({ program: 'Prog', 'index-type': 'program' });
      expect(result.changes[0]).toEqual({ kind: 'removed', field: 'module', oldValue: '' });
    });

    it('should remove a field that has no canonical value', () => {
      const result = reconcileFrontmatter({ class: 'Class' }, { program: 'Prog', course: 'Course' }, 3, 'none');

      expect(result.frontmatter).toEqual({ program: 'Prog', course: 'Course' });
      expect(result.changes[0]).toEqual({ kind: 'removed', field: 'class', oldValue: 'Class' });
    });
  });

  describe('index-type', () => {
    it('should correct a stale index-type in place', () => {
      const result = reconcileFrontmatter(
        { 'index-type': 'course', title: 'Program' },
        { program: 'Program' },
        1,
        'program'
      );

      expect(Object.keys(result.frontmatter)).toEqual(['index-type', 'title', 'program']);
      expect(result.frontmatter['index-type']).toBe('program');
      expect(result.changes).toContainEqual({
        kind: 'corrected',
        field: 'index-type',
        oldValue: 'course',
        newValue: 'program',
        malformed: false,
      });
    });

    it('should remove index-type from content files', () => {
      const result = reconcileFrontmatter({ 'index-type': 'class', title: 'Reading' }, {}, 0, 'none');

      expect(result.frontmatter).toEqual({ title: 'Reading' });
      expect(result.changes).toEqual([{ kind: 'removed', field: 'index-type', oldValue: 'class' }]);
    });
  });

  describe('passthrough', () => {
    it('should copy unrelated keys unchanged', () => {
      const tags = ['finance', 'reading'];
      const created = new Date('2024-05-01T00:00:00Z');
      const result = reconcileFrontmatter(
        { title: 'Reading', tags, 'date-created': created, Program: 'Not a hierarchy key' },
        { program: 'Prog' },
        1,
        'none'
      );

      expect(result.frontmatter.tags).toBe(tags);
      expect(result.frontmatter['date-created']).toBe(created);
      expect(result.frontmatter.Program).toBe('Not a hierarchy key');
      expect(result.frontmatter.title).toBe('Reading');
    });

    it('should keep __proto__ as a plain key', () => {
      const existing: Record<string, unknown> = JSON.parse('{"__proto__": {"polluted": true}, "title": "x"}');
      const result = reconcileFrontmatter(existing, {}, 0, 'none');

      expect(Object.keys(result.frontmatter)).toEqual(['__proto__', 'title']);
      expect(Object.getPrototypeOf(result.frontmatter)).toBe(Object.prototype);
    });

    it('should not mutate the input', () => {
      const existing = { course: 'Wrong', 'index-type': 'class' };
      reconcileFrontmatter(existing, { program: 'Prog' }, 1, 'program');

      expect(existing).toEqual({ course: 'Wrong', 'index-type': 'class' });
    });
  });

  it('should report no changes for already-correct frontmatter', () => {
    const result = reconcileFrontmatter(
      { program: 'Prog', course: 'Course', 'index-type': 'course', title: 'Course' },
      { program: 'Prog', course: 'Course' },
      2,
      'course'
    );

    expect(result.changes).toEqual([]);
  });
});

describe('partitionFrontmatter', () => {
  it('should separate hierarchy fields, index-type and passthrough keys', () => {
    const result = partitionFrontmatter({
      title: 'Finance',
      program: 'MBA',
      'index-type': 'program',
      module: ['a'],
      tags: [],
    });

    expect(result.hierarchy).toEqual({ program: 'MBA', module: ['a'] });
    expect(result.hasIndexType).toBe(true);
    expect(result.indexType).toBe('program');
    expect(result.passthrough).toEqual({ title: 'Finance', tags: [] });
    expect(Object.keys(result.passthrough)).toEqual(['title', 'tags']);
  });

  it('should be the passthrough bag the reconciler copies through', () => {
    const existing = { title: 'Finance', program: 'Old', tags: ['a'] };
    const { passthrough } = partitionFrontmatter(existing);

    const { frontmatter } = reconcileFrontmatter(existing, { program: 'Finance' }, 1, 'program');

    for (const [key, value] of Object.entries(passthrough)) {
      expect(frontmatter[key]).toBe(value);
    }
    expect(Object.keys(frontmatter)).toEqual(['title', 'program', 'tags', 'index-type']);
  });

  it('should report a missing index-type', () => {
    const result = partitionFrontmatter({ title: 'x' });
    expect(result.hasIndexType).toBe(false);
    expect(result.indexType).toBeUndefined();
  });
});
