export interface WorkflowJob {
  name: string;
  steps: string[];
}

export interface WorkflowSpec {
  name: string;
  file: string;
  triggers: string[];
  jobs: WorkflowJob[];
  /** `paths` filters across push/pull_request; empty means the workflow has no path filter. */
  pathGlobs: string[];
  pathIgnoreGlobs: string[];
}
