/**
 * Tests for index-type derivation, maxLevel and stored-value validation
 */

import { describe, it, expect } from 'vitest';
import { classifyPath } from '../src/paths.js';
import {
  deriveIndexType,
  isIndexType,
  maxLevelFor,
  validateIndexType,
  MAX_LEVEL_BY_INDEX_TYPE,
} from '../src/indexType.js';

const ROOT = '/vault';

describe('deriveIndexType', () => {
  it.each([
    ['index.md', 'main'],
    ['Prog/Prog.md', 'program'],
    ['Prog/Course/Course.md', 'course'],
    ['Prog/Course/Class/Class.md', 'class'],
    ['Prog/Course/Class/Module1/Module1.md', 'module'],
    ['Prog/Course/Class/Module1/Lesson 2/Lesson 2.md', 'module'],
  ])('should derive %s as %s', (relativePath, expected) => {
    expect(deriveIndexType(classifyPath(ROOT, relativePath))).toBe(expected);
  });

  it('should return none for content files at any depth', () => {
    expect(deriveIndexType(classifyPath(ROOT, 'readme.md'))).toBe('none');
    expect(deriveIndexType(classifyPath(ROOT, 'Prog/Course/Class/reading.md'))).toBe('none');
  });
});

describe('maxLevelFor', () => {
  it('should use the table for index files', () => {
    const classification = classifyPath(ROOT, 'Prog/Course/Course.md');
    expect(maxLevelFor(classification, 'course')).toBe(2);
  });

  it('should use the folder level for content files', () => {
    expect(maxLevelFor(classifyPath(ROOT, 'Prog/Course/Class/case-study.md'), 'none')).toBe(3);
    expect(maxLevelFor(classifyPath(ROOT, 'Prog/Course/Class/Module1/Deep/Deeper/note.md'), 'none')).toBe(4);
    expect(maxLevelFor(classifyPath(ROOT, 'loose-note.md'), 'none')).toBe(0);
  });

  it('should map every index type to its level', () => {
    expect(MAX_LEVEL_BY_INDEX_TYPE).toEqual({ main: 0, program: 1, course: 2, class: 3, module: 4 });
  });
});

describe('isIndexType', () => {
  it('should accept known index types', () => {
    expect(isIndexType('module')).toBe(true);
    expect(isIndexType('none')).toBe(true);
  });

  it('should reject other values', () => {
    expect(isIndexType('program-index')).toBe(false);
    expect(isIndexType(3)).toBe(false);
    expect(isIndexType(undefined)).toBe(false);
  });
});

describe('validateIndexType', () => {
  it('should report a stored value that conflicts with the path', () => {
    const result = validateIndexType(classifyPath(ROOT, 'Prog/Prog.md'), { 'index-type': 'course' });

    expect(result).toEqual({ derived: 'program', stored: 'course', hasStored: true, matches: false });
  });

  it('should accept a stored value equal to the derived type', () => {
    const result = validateIndexType(classifyPath(ROOT, 'Prog/Prog.md'), { 'index-type': 'program' });
    expect(result.matches).toBe(true);
  });

  it('should flag a missing index-type on an index file', () => {
    const result = validateIndexType(classifyPath(ROOT, 'Prog/Prog.md'), {});
    expect(result.matches).toBe(false);
    expect(result.hasStored).toBe(false);
  });

  it('should flag any index-type on a content file', () => {
    const result = validateIndexType(classifyPath(ROOT, 'Prog/notes.md'), { 'index-type': 'none' });
    expect(result.derived).toBe('none');
    expect(result.matches).toBe(false);
  });

  it('should accept a content file without index-type', () => {
    expect(validateIndexType(classifyPath(ROOT, 'Prog/notes.md'), { title: 'Notes' }).matches).toBe(true);
  });
});
