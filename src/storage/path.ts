// Path helpers shared by every backend.
//
// Paths are relative to the operator root: no leading slash, no repeated
// slashes, directories end with "/". The empty path is the root itself ("/").

export function normalizePath(path: string): string {
  const isDir = path.endsWith('/');
  const segments = path.split('/').filter((segment) => segment.length > 0);

  if (segments.length === 0) {
    return '/';
  }

  const joined = segments.join('/');
  return isDir ? `${joined}/` : joined;
}

/** Normalize a configured root to "/a/b/" form ("/" when unset) */
export function normalizeRoot(root: string | undefined): string {
  const segments = (root ?? '').split('/').filter((segment) => segment.length > 0);
  return segments.length === 0 ? '/' : `/${segments.join('/')}/`;
}

export function isDirPath(path: string): boolean {
  return path.endsWith('/');
}

/** Parent directory of a normalized path ("/" for top-level entries) */
export function parentOf(path: string): string {
  const base = path.endsWith('/') ? path.slice(0, -1) : path;
  const idx = base.lastIndexOf('/');
  return idx === -1 ? '/' : base.slice(0, idx + 1);
}

/**
 * The direct child of `dir` that `path` lives under, or null when `path` is
 * not below `dir`. For "a/" and "a/b/c" this is "a/b/".
 */
export function directChild(dir: string, path: string): string | null {
  const prefix = dir === '/' ? '' : dir;
  if (!path.startsWith(prefix) || path === prefix) {
    return null;
  }

  const rest = path.slice(prefix.length);
  const slash = rest.indexOf('/');
  return slash === -1 || slash === rest.length - 1 ? path : prefix + rest.slice(0, slash + 1);
}
