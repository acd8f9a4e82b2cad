export type AiProvider = "auto" | "codex" | "claude";
export type ModelProfileName = "auto" | "default" | "small";
export type DecodingMode = "schema" | "freeform";
