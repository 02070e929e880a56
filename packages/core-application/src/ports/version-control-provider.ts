export interface VersionControlProvider {
  /** Modified and untracked paths, in the order the tool reports them. */
  listDirtyPaths(): Promise<string[]>;

  readFileAt(path: string, ref: string): Promise<Buffer | null>;

  /** ISO-8601 author date of the last commit touching `path` at `ref`. */
  lastCommitTimestamp(path: string, ref: string): Promise<string | null>;

  changedPathsInCommit(commitRef: string): Promise<string[]>;
}
