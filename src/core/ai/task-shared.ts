import type { CommandResult, StatusCallback } from "./contracts.js";
import type { ResolvedAiProvider } from "./provider-selection.js";
import { startLiveStatus } from "./status.js";

export async function runWithLiveStatus<T>(
  provider: ResolvedAiProvider,
  onStatus: StatusCallback | undefined,
  runTask: () => Promise<T>
): Promise<T> {
  const stopLiveStatus = startLiveStatus(provider, onStatus);
  try {
    return await runTask();
  } finally {
    stopLiveStatus();
  }
}

export function combineOutput(result: CommandResult): string {
  return `${result.stdout}\n${result.stderr}`.trim();
}
