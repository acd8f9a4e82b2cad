export type ChangeKind = "added" | "modified" | "deleted" | "renamed";

export interface Hunk {
  startLine: number;
  endLine: number;
  text: string;
}

export interface FileChange {
  path: string;
  changeKind: ChangeKind;
  previousPath?: string;
  hunks: Hunk[];
}

export interface BranchMetadata {
  title: string;
  commitSubjects: string[];
}

export interface ChangeSet {
  repoRef: string;
  base: string;
  head: string;
  files: FileChange[];
  metadata: BranchMetadata;
}
