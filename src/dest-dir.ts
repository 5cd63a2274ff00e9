/**
 * Prefix a manifest path with the destination directory of a staged install.
 * The two are concatenated as-is, the way `$DESTDIR$prefix` is in a makefile,
 * so `/tmp/stage` + `/usr/lib/libfoo.so` gives `/tmp/stage/usr/lib/libfoo.so`.
 */
export function applyDestDir(destDir: string | undefined, path: string): string {
  if (destDir === undefined || destDir === "") {
    return path;
  }
  return destDir + path;
}
