export function joinRemotePath(remoteRoot: string, relativePath: string): string {
  return `${remoteRoot}/${relativePath}`.replace(/\/{2,}/g, "/");
}

/** Parent directory of a remote path, or null when it sits at the root. */
export function remoteDirname(remotePath: string): string | null {
  const idx = remotePath.lastIndexOf("/");
  if (idx <= 0) return null;
  return remotePath.slice(0, idx);
}
