import * as path from 'path';
import { resolveStorePath, toLocation } from './path_resolver';
import { PathEscapeError } from './errors';

describe('resolveStorePath', () => {
  const root = path.resolve('/srv/agora/community');

  it('should resolve a nested location under the root', () => {
    const resolved = resolveStorePath(root, 'sub/a.json');
    expect(resolved).toBe(path.join(root, 'sub', 'a.json'));
    expect(resolved.startsWith(root + path.sep)).toBe(true);
  });

  it('should reject a location climbing out of the root', () => {
    expect(() => resolveStorePath(root, '../../etc/passwd')).toThrow(PathEscapeError);
  });

  it('should reject an escape hidden behind a normal segment', () => {
    expect(() => resolveStorePath(root, 'sub/../../secret.json')).toThrow(PathEscapeError);
  });

  it('should accept dot segments that stay inside', () => {
    expect(resolveStorePath(root, './sub/../b.json')).toBe(path.join(root, 'b.json'));
  });

  it('should treat backslashes as separators', () => {
    expect(() => resolveStorePath(root, '..\\..\\etc\\passwd')).toThrow(PathEscapeError);
    expect(resolveStorePath(root, 'sub\\c.json')).toBe(path.join(root, 'sub', 'c.json'));
  });

  it('should reject absolute paths', () => {
    expect(() => resolveStorePath(root, '/etc/passwd')).toThrow(PathEscapeError);
    expect(() => resolveStorePath(root, 'C:\\Windows\\win.ini')).toThrow(PathEscapeError);
  });

  it('should reject empty and root-only paths', () => {
    expect(() => resolveStorePath(root, '')).toThrow(PathEscapeError);
    expect(() => resolveStorePath(root, '.')).toThrow(PathEscapeError);
    expect(() => resolveStorePath(root, 'sub/..')).toThrow(PathEscapeError);
  });

  it('should carry the rejected path on the error', () => {
    let caught: unknown;
    try {
      resolveStorePath(root, '../x.json');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(PathEscapeError);
    expect(caught).toMatchObject({ code: 'PATH_ESCAPE', metadata: { path: '../x.json' } });
  });
});

describe('toLocation', () => {
  it('should produce a slash-separated relative path', () => {
    const root = path.resolve('/srv/agora/community');
    expect(toLocation(root, path.join(root, 'sub', 'a.json'))).toBe('sub/a.json');
  });
});
