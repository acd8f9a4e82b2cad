import { spawnSync } from "node:child_process";

import type { AiProvider } from "../types.js";

export type ResolvedAiProvider = Exclude<AiProvider, "auto">;

function hasBinary(command: string): boolean {
  const locator = process.platform === "win32" ? "where" : "which";
  const probe = spawnSync(locator, [command], { encoding: "utf8" });
  return probe.status === 0;
}

export function chooseProvider(
  requested: AiProvider,
  probe: (command: string) => boolean = hasBinary
): ResolvedAiProvider | null {
  if (requested === "codex") return probe("codex") ? "codex" : null;
  if (requested === "claude") return probe("claude") ? "claude" : null;

  const preference: ResolvedAiProvider[] = ["claude", "codex"];
  for (const candidate of preference) {
    if (probe(candidate)) return candidate;
  }

  return null;
}
