/** Raw `install-hook` flags as commander hands them over. */
export interface InstallHookCommandOptions {
  hook?: string;
  yes?: boolean;
}
