import { InvalidUriError } from '../errors.js';
import { parseUri, relationKeyString, workspaceOf } from './uriUtils.js';

describe('uriUtils', () => {
  describe('parseUri', () => {
    it('splits scheme, workspace and path', () => {
      expect(parseUri('concept://notes/physics/entropy')).toEqual({
        scheme: 'concept',
        workspaceId: 'notes',
        path: 'physics/entropy',
      });
    });

    it('accepts resource URIs', () => {
      expect(parseUri('resource://docs/readme.md').scheme).toBe('resource');
    });

    it('rejects unknown schemes', () => {
      expect(() => parseUri('http://example/x')).toThrow(
        "Invalid URI 'http://example/x': scheme must be 'concept' or 'resource', got 'http'"
      );
    });

    it('rejects an empty workspace id', () => {
      expect(() => parseUri('concept:///x')).toThrow(InvalidUriError);
    });

    it('rejects an empty path', () => {
      expect(() => parseUri('concept://notes/')).toThrow("Invalid URI 'concept://notes/': path is empty");
    });

    it('rejects strings without the scheme separator', () => {
      expect(() => parseUri('notes/x')).toThrow(
        "Invalid URI 'notes/x': expected <scheme>://<workspace-id>/<path>"
      );
    });
  });

  it('workspaceOf returns the workspace id', () => {
    expect(workspaceOf('resource://shared/file.txt')).toBe('shared');
  });

  it('relationKeyString escapes the separator', () => {
    expect(relationKeyString('concept://a/x|y', 'concept://a/z', 'rel'))
      .not.toBe(relationKeyString('concept://a/x', 'y|concept://a/z', 'rel'));
    expect(relationKeyString('concept://a/x', 'concept://a/y', 'is_a'))
      .toBe('concept%3A%2F%2Fa%2Fx|concept%3A%2F%2Fa%2Fy|is_a');
  });
});
