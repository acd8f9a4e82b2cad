import { existsSync, readFileSync } from "node:fs";
import { basename } from "node:path";

import { InputError } from "../errors.js";
import type { ChangeSet } from "../types.js";
import { freezeChangeSet } from "./contracts.js";
import type { DiffProvider } from "./contracts.js";
import { parseUnifiedDiff } from "./unified-diff.js";

/** Builds a ChangeSet from a saved unified diff, e.g. a pull request's `.diff` download. */
export class PatchFileDiffProvider implements DiffProvider {
  private readonly patchPath: string;

  constructor(patchPath: string) {
    this.patchPath = patchPath;
  }

  async getChangeSet(repoRef: string, base: string, head: string): Promise<ChangeSet> {
    if (!existsSync(this.patchPath)) {
      throw new InputError(`Diff file not found: ${this.patchPath}`);
    }
    const files = parseUnifiedDiff(readFileSync(this.patchPath, "utf8"));
    if (!files.length) {
      throw new InputError(`Diff file contains no file changes: ${this.patchPath}`);
    }
    return freezeChangeSet({
      repoRef,
      base,
      head,
      files,
      metadata: { title: basename(this.patchPath), commitSubjects: [] }
    });
  }
}
