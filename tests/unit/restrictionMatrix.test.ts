/**
 * Unit tests for per-member restriction flags
 * Tests: src/services/restrictionMatrix.ts
 */

import { beforeEach, describe, expect, it } from 'vitest';
import { openDatabase } from '../../src/database';
import {
  activeFlags,
  emptyRestrictionSet,
  FULL_PERMISSIONS,
  projectPermissions,
  RestrictionMatrix,
} from '../../src/services/restrictionMatrix';
import { memberKey } from '../../src/types';
import { InvalidInputError } from '../../src/utils/errors';

const key = memberKey(-100111, 600);

describe('RestrictionMatrix', () => {
  let matrix: RestrictionMatrix;

  beforeEach(() => {
    matrix = new RestrictionMatrix(openDatabase(':memory:'));
  });

  it('reads all-false flags for a member without a record', () => {
    expect(matrix.getFlags(key)).toEqual(emptyRestrictionSet());
    expect(matrix.hasEntry(key)).toBe(false);
  });

  it('toggle creates the record and flips one flag at a time', () => {
    const afterFirst = matrix.toggleFlag(key, 'sticker');
    expect(afterFirst.sticker).toBe(true);
    expect(activeFlags(afterFirst)).toEqual(['sticker']);
    expect(matrix.hasEntry(key)).toBe(true);

    const afterSecond = matrix.toggleFlag(key, 'sticker');
    expect(afterSecond.sticker).toBe(false);
    expect(matrix.hasEntry(key)).toBe(true);
  });

  it('rejects names that are not restriction flags', () => {
    expect(() => matrix.toggleFlag(key, 'voice')).toThrow(InvalidInputError);
    expect(matrix.hasEntry(key)).toBe(false);
  });

  it('ensure materializes a record without changing existing flags', () => {
    matrix.toggleFlag(key, 'media');
    expect(matrix.ensure(key).media).toBe(true);
    expect(matrix.ensure(memberKey(-100111, 601))).toEqual(emptyRestrictionSet());
  });

  it('setFlags overwrites every flag', () => {
    matrix.toggleFlag(key, 'gif');
    matrix.setFlags(key, { ...emptyRestrictionSet(), link: true, spam: true });
    expect(activeFlags(matrix.getFlags(key))).toEqual(['spam', 'link']);
  });

  it('clear drops the record', () => {
    matrix.ensure(key);
    expect(matrix.clear(key)).toBe(true);
    expect(matrix.hasEntry(key)).toBe(false);
    expect(matrix.clear(key)).toBe(false);
  });

  describe('allowsLinks', () => {
    it('is false without a record', () => {
      expect(matrix.allowsLinks(key)).toBe(false);
    });

    it('is true for a record with link off', () => {
      matrix.ensure(key);
      expect(matrix.allowsLinks(key)).toBe(true);
    });

    it('is false once the link flag is on', () => {
      matrix.toggleFlag(key, 'link');
      expect(matrix.allowsLinks(key)).toBe(false);
    });
  });
});

describe('projectPermissions', () => {
  it('grants everything when no flag is set', () => {
    expect(projectPermissions(emptyRestrictionSet())).toEqual(FULL_PERMISSIONS);
  });

  it('denies media sending for the media flag and keeps text', () => {
    const permissions = projectPermissions({ ...emptyRestrictionSet(), media: true });
    expect(permissions.can_send_messages).toBe(true);
    expect(permissions.can_send_photos).toBe(false);
    expect(permissions.can_send_videos).toBe(false);
    expect(permissions.can_add_web_page_previews).toBe(true);
  });

  it('denies link previews and polls for the link flag', () => {
    const permissions = projectPermissions({ ...emptyRestrictionSet(), link: true });
    expect(permissions.can_add_web_page_previews).toBe(false);
    expect(permissions.can_send_polls).toBe(false);
    expect(permissions.can_send_photos).toBe(true);
  });
});
