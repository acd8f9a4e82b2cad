/** Raw `check` flags as commander hands them over; values are validated in the command layer. */
export interface CheckCommandOptions {
  base?: string;
  head?: string;
  diffFile?: string;
  project?: string;
  description?: string;
  docs?: string;
  provider?: string;
  model?: string;
  profile?: string;
  maxRetries?: number | string;
  approvalThreshold?: number | string;
  aiTimeoutSec?: number | string;
  format?: string;
  dryRun?: boolean;
  failOnApproval?: boolean;
}
